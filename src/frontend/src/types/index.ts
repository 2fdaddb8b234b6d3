export const FAULT_CATEGORIES = [
  'Healthy Panel',
  'Microcracks',
  'Hot Spots',
  'Snail Trails',
  'Cell Breakage',
  'Delamination',
  'Bypass Diode Failure',
  'Potential Induced Degradation (PID)',
] as const

export type FaultCategory = (typeof FAULT_CATEGORIES)[number]

export const HEALTHY_CATEGORY: FaultCategory = 'Healthy Panel'

export function isFaultCategory(value: string): value is FaultCategory {
  return FAULT_CATEGORIES.some((category) => category === value)
}

export type Severity = 'Low' | 'Medium' | 'High'

export interface RasterImage {
  width: number
  height: number
  channels: 3 | 4
  data: Uint8Array | Uint8ClampedArray
}

export interface FaultPrediction {
  readonly label: FaultCategory
  readonly confidence: number
  readonly distribution: Readonly<Record<FaultCategory, number>>
}

export interface RankedProbability {
  label: FaultCategory
  probability: number
}

export interface FaultInfo {
  readonly description: string
  readonly severity?: Severity
  readonly symptoms?: readonly string[]
  readonly repairSteps: readonly string[]
  readonly prevention: readonly string[]
  readonly costEstimate?: string
}

export interface ServiceOffice {
  readonly name: string
  readonly email: string
  readonly phone: string
  readonly address: string
  readonly workingHours: string
}

export interface ContactDetails {
  name: string
  phone: string
  email: string
  panelLocation?: string
  notes?: string
}

export interface FaultReport {
  timestamp: string
  userDetails: {
    name: string
    phone: string
    email: string
    pincode: string
    panelLocation: string
  }
  faultDetection: {
    faultType: FaultCategory
    confidence: string
    severity: Severity | 'Unknown'
    description: string
  }
  officeDetails: {
    officeName: string
    email: string
    phone: string
    address: string
    workingHours: string
  }
  additionalNotes: string
}

export interface GeneratedReport {
  report: FaultReport
  text: string
  fileName: string
  mailtoLink: string
  telLink: string
}
