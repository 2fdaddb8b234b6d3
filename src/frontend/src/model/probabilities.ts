import { FAULT_CATEGORIES, type FaultCategory, type FaultPrediction, type RankedProbability } from '../types'

export const CLASS_NAMES = FAULT_CATEGORIES

export function softmax(logits: readonly number[]): number[] {
  if (logits.length === 0) return []
  const max = Math.max(...logits)
  const exps = logits.map((value) => Math.exp(value - max))
  const total = exps.reduce((sum, value) => sum + value, 0)
  return exps.map((value) => value / total)
}

/** Index of the largest value; the first one wins on ties. */
export function argmax(values: readonly number[]): number {
  let best = 0
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i
  }
  return best
}

/** Highest probability first; equal probabilities keep category order. */
export function rankProbabilities(distribution: Readonly<Record<FaultCategory, number>>): RankedProbability[] {
  return CLASS_NAMES.map((label) => ({ label, probability: distribution[label] })).sort(
    (a, b) => b.probability - a.probability
  )
}

function distributionOf(p: readonly number[]): Record<FaultCategory, number> {
  const [c0, c1, c2, c3, c4, c5, c6, c7] = CLASS_NAMES
  return {
    [c0]: p[0],
    [c1]: p[1],
    [c2]: p[2],
    [c3]: p[3],
    [c4]: p[4],
    [c5]: p[5],
    [c6]: p[6],
    [c7]: p[7],
  }
}

export function toPrediction(probabilities: readonly number[]): FaultPrediction {
  if (probabilities.length !== CLASS_NAMES.length) {
    throw new RangeError(`Expected ${CLASS_NAMES.length} probabilities, got ${probabilities.length}`)
  }
  const distribution = Object.freeze(distributionOf(probabilities))
  const label = CLASS_NAMES[argmax(probabilities)]
  return Object.freeze({ label, confidence: distribution[label], distribution })
}
