import { useState } from 'react'
import { Send } from 'lucide-react'
import clsx from 'clsx'
import { buildReport, type ContactErrors, type ContactField } from '../lib/report'
import type { ContactDetails, FaultInfo, FaultPrediction, GeneratedReport, ServiceOffice } from '../types'

interface ReportFormProps {
  prediction: FaultPrediction
  faultInfo: FaultInfo
  postalCode: string
  office: ServiceOffice
  onReportGenerated: (report: GeneratedReport) => void
}

const EMPTY_CONTACT: ContactDetails = {
  name: '',
  phone: '',
  email: '',
  panelLocation: '',
  notes: '',
}

const fields: { key: Exclude<ContactField, 'notes'>; label: string; placeholder: string; type: string }[] = [
  { key: 'name', label: 'Your Name *', placeholder: 'Jane Doe', type: 'text' },
  { key: 'email', label: 'Email Address *', placeholder: 'your.email@example.com', type: 'email' },
  { key: 'phone', label: 'Phone Number *', placeholder: '+91-XXXXXXXXXX', type: 'tel' },
  { key: 'panelLocation', label: 'Panel Location', placeholder: 'Address where panel is installed', type: 'text' },
]

export default function ReportForm({ prediction, faultInfo, postalCode, office, onReportGenerated }: ReportFormProps) {
  const [contact, setContact] = useState<ContactDetails>(EMPTY_CONTACT)
  const [errors, setErrors] = useState<ContactErrors>({})

  const update = (key: ContactField, value: string) => {
    setContact((current) => ({ ...current, [key]: value }))
  }

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    const result = buildReport({ prediction, faultInfo, contact, postalCode, office })
    if (!result.ok) {
      setErrors(result.errors)
      return
    }
    setErrors({})
    onReportGenerated(result.value)
  }

  const hasErrors = Object.keys(errors).length > 0

  return (
    <form onSubmit={handleSubmit} noValidate className="space-y-4">
      <p className="text-sm text-gray-600">Fill in your details to send the fault report:</p>

      <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
        {fields.map((field) => (
          <div key={field.key}>
            <label htmlFor={`contact-${field.key}`} className="block text-sm font-medium text-gray-700 mb-1">
              {field.label}
            </label>
            <input
              id={`contact-${field.key}`}
              type={field.type}
              value={contact[field.key] ?? ''}
              placeholder={field.placeholder}
              onChange={(e) => update(field.key, e.target.value)}
              aria-invalid={Boolean(errors[field.key])}
              className={clsx(
                'w-full px-3 py-2 border rounded-lg focus:outline-none focus:ring-2 focus:ring-primary-400',
                errors[field.key] ? 'border-red-400' : 'border-gray-300'
              )}
            />
            {errors[field.key] && <p className="mt-1 text-sm text-red-600">{errors[field.key]}</p>}
          </div>
        ))}
      </div>

      <div>
        <label htmlFor="contact-notes" className="block text-sm font-medium text-gray-700 mb-1">
          Additional Notes (Optional)
        </label>
        <textarea
          id="contact-notes"
          value={contact.notes ?? ''}
          onChange={(e) => update('notes', e.target.value)}
          placeholder="Any additional information about the fault..."
          rows={4}
          className="w-full px-3 py-2 border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-primary-400"
        />
      </div>

      {hasErrors && (
        <div role="alert" className="p-3 bg-red-50 border border-red-200 rounded-lg text-red-800">
          Please fill in all required fields (marked with *)
        </div>
      )}

      <button
        type="submit"
        className="w-full flex items-center justify-center gap-2 py-3 px-4 bg-primary-600 text-white rounded-lg font-medium hover:bg-primary-700 transition-colors"
      >
        <Send className="h-4 w-4" />
        Send Report to Office
      </button>
    </form>
  )
}
