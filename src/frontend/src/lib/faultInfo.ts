import { z } from 'zod'
import faultCatalog from '../data/faultInfo.json'
import { FAULT_CATEGORIES, HEALTHY_CATEGORY, isFaultCategory, type FaultCategory, type FaultInfo } from '../types'

const FaultInfoSchema = z.object({
  description: z.string().trim().min(1),
  severity: z.enum(['Low', 'Medium', 'High']).optional(),
  symptoms: z.array(z.string()).optional(),
  repairSteps: z.array(z.string()),
  prevention: z.array(z.string()),
  costEstimate: z.string().optional(),
})

const FaultCatalogSchema = z.record(z.string(), FaultInfoSchema)

export const DEFAULT_FAULT_INFO: FaultInfo = Object.freeze({
  description: '',
  repairSteps: Object.freeze([]),
  prevention: Object.freeze([]),
})

/**
 * Validates a fault catalogue and returns it as a frozen table. Every fault
 * category must have an entry; unknown keys are rejected so typos surface.
 */
export function buildFaultInfoTable(raw: unknown): ReadonlyMap<FaultCategory, FaultInfo> {
  const catalog = FaultCatalogSchema.parse(raw)

  for (const key of Object.keys(catalog)) {
    if (!isFaultCategory(key)) {
      throw new Error(`Fault catalogue has an entry for unknown category "${key}"`)
    }
  }

  const table = new Map<FaultCategory, FaultInfo>()
  for (const category of FAULT_CATEGORIES) {
    const entry = catalog[category]
    if (!entry) {
      throw new Error(`Fault catalogue is missing category "${category}"`)
    }
    table.set(
      category,
      Object.freeze({
        ...entry,
        symptoms: entry.symptoms && Object.freeze([...entry.symptoms]),
        repairSteps: Object.freeze([...entry.repairSteps]),
        prevention: Object.freeze([...entry.prevention]),
      })
    )
  }
  return table
}

export const FAULT_INFO = buildFaultInfoTable(faultCatalog)

export function getFaultInfo(label: string): FaultInfo {
  if (!isFaultCategory(label)) return DEFAULT_FAULT_INFO
  return FAULT_INFO.get(label) ?? DEFAULT_FAULT_INFO
}

export type ResultTone = 'success' | 'error' | 'warning' | 'info'

/** Banner colour for a detection result. */
export function severityTone(label: string, info: FaultInfo): ResultTone {
  if (label === HEALTHY_CATEGORY) return 'success'
  switch (info.severity) {
    case 'High':
      return 'error'
    case 'Medium':
      return 'warning'
    default:
      return 'info'
  }
}
