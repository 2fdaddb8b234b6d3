import { CheckCircle, Clock, Mail, MapPin, Phone } from 'lucide-react'
import type { GeneratedReport } from '../types'

interface ReportSummaryProps {
  generated: GeneratedReport
}

export default function ReportSummary({ generated }: ReportSummaryProps) {
  const { report, text, mailtoLink, telLink } = generated
  const office = report.officeDetails

  return (
    <div className="space-y-6">
      <div role="status" className="p-3 bg-green-50 border border-green-200 rounded-lg flex items-center gap-2">
        <CheckCircle className="h-5 w-5 text-green-600" />
        <span className="text-green-800 font-medium">Report Generated Successfully!</span>
      </div>

      <div>
        <h4 className="font-medium text-gray-700 mb-3">Contact Office</h4>
        <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
          <a href={mailtoLink} className="flex items-center gap-2 text-primary-700 hover:underline">
            <Mail className="h-4 w-4" />
            {office.email}
          </a>
          <a href={telLink} className="flex items-center gap-2 text-primary-700 hover:underline">
            <Phone className="h-4 w-4" />
            {office.phone}
          </a>
          <div className="text-sm text-gray-600">
            <p className="flex items-center gap-2">
              <MapPin className="h-4 w-4" />
              {office.address}
            </p>
            <p className="flex items-center gap-2 mt-1">
              <Clock className="h-4 w-4" />
              Working Hours: {office.workingHours}
            </p>
          </div>
        </div>
      </div>

      <details className="border rounded-lg">
        <summary className="px-4 py-3 cursor-pointer font-medium text-gray-700">View Generated Report</summary>
        <pre className="px-4 pb-4 text-xs overflow-x-auto">{JSON.stringify(report, null, 2)}</pre>
      </details>

      <div>
        <h4 className="font-medium text-gray-700 mb-2">Report Summary</h4>
        <pre className="p-4 bg-gray-50 rounded-lg text-sm overflow-x-auto">{text}</pre>
      </div>
    </div>
  )
}
