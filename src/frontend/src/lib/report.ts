import { format } from 'date-fns'
import { z } from 'zod'
import type {
  ContactDetails,
  FaultInfo,
  FaultPrediction,
  FaultReport,
  GeneratedReport,
  ServiceOffice,
} from '../types'

export const ContactDetailsSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  phone: z.string().trim().min(1, 'Phone number is required'),
  email: z.string().trim().min(1, 'Email address is required'),
  panelLocation: z.string().trim().optional(),
  notes: z.string().trim().optional(),
})

export type ContactField = keyof ContactDetails
export type ContactErrors = Partial<Record<ContactField, string>>

export interface ReportInput {
  prediction: FaultPrediction
  faultInfo: FaultInfo
  contact: ContactDetails
  postalCode: string
  office: ServiceOffice
  now?: Date
}

export type ReportResult = { ok: true; value: GeneratedReport } | { ok: false; errors: ContactErrors }

export function formatConfidence(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`
}

export function reportFileName(now: Date): string {
  return `fault_report_${format(now, 'yyyyMMdd_HHmmss')}.txt`
}

export function validateContact(
  contact: ContactDetails
): { ok: true; value: ContactDetails } | { ok: false; errors: ContactErrors } {
  const parsed = ContactDetailsSchema.safeParse(contact)
  if (parsed.success) {
    return { ok: true, value: parsed.data }
  }

  const errors: ContactErrors = {}
  for (const issue of parsed.error.issues) {
    const [field] = issue.path
    if (field === 'name' || field === 'phone' || field === 'email' || field === 'panelLocation' || field === 'notes') {
      errors[field] ??= issue.message
    }
  }
  return { ok: false, errors }
}

export function renderReportText(report: FaultReport): string {
  const { userDetails: user, faultDetection: fault, officeDetails: office } = report
  return `FAULT DETECTION REPORT
======================

Date: ${report.timestamp}
User: ${user.name}
Phone: ${user.phone}
Email: ${user.email}
Pincode: ${user.pincode}
Location: ${user.panelLocation}

FAULT DETECTED:
- Type: ${fault.faultType}
- Confidence: ${fault.confidence}
- Severity: ${fault.severity}
- Description: ${fault.description}

SERVICE OFFICE:
- Name: ${office.officeName}
- Address: ${office.address}
- Phone: ${office.phone}
- Email: ${office.email}

Additional Notes: ${report.additionalNotes}
`
}

function emailBody(report: FaultReport): string {
  const { userDetails: user, faultDetection: fault } = report
  return `Dear ${report.officeDetails.officeName},

I am reporting a solar panel fault detected through the fault detection system.

FAULT DETAILS:
- Type: ${fault.faultType}
- Confidence: ${fault.confidence}
- Severity: ${fault.severity}

MY DETAILS:
- Name: ${user.name}
- Phone: ${user.phone}
- Email: ${user.email}
- Pincode: ${user.pincode}
- Panel Location: ${user.panelLocation}

Additional Notes: ${report.additionalNotes}

Please contact me to schedule a service visit.

Thank you.`
}

export function buildMailtoLink(report: FaultReport): string {
  const subject = encodeURIComponent(`Fault Report - ${report.faultDetection.faultType}`)
  const body = encodeURIComponent(emailBody(report))
  return `mailto:${report.officeDetails.email}?subject=${subject}&body=${body}`
}

export function buildTelLink(phone: string): string {
  return `tel:${phone.replace(/[-+ ]/g, '')}`
}

/**
 * Validates the contact details and, only if they are complete, assembles the
 * report with its text rendering and contact links.
 */
export function buildReport(input: ReportInput): ReportResult {
  const validation = validateContact(input.contact)
  if (!validation.ok) {
    return validation
  }

  const contact = validation.value
  const { prediction, faultInfo, office } = input
  const now = input.now ?? new Date()

  const report: FaultReport = {
    timestamp: format(now, 'yyyy-MM-dd HH:mm:ss'),
    userDetails: {
      name: contact.name,
      phone: contact.phone,
      email: contact.email,
      pincode: input.postalCode.trim(),
      panelLocation: contact.panelLocation ?? '',
    },
    faultDetection: {
      faultType: prediction.label,
      confidence: formatConfidence(prediction.confidence),
      severity: faultInfo.severity ?? 'Unknown',
      description: faultInfo.description,
    },
    officeDetails: {
      officeName: office.name,
      email: office.email,
      phone: office.phone,
      address: office.address,
      workingHours: office.workingHours,
    },
    additionalNotes: contact.notes ?? '',
  }

  return {
    ok: true,
    value: {
      report,
      text: renderReportText(report),
      fileName: reportFileName(now),
      mailtoLink: buildMailtoLink(report),
      telLink: buildTelLink(office.phone),
    },
  }
}
