import { describe, it, expect } from 'vitest'
import { argmax, rankProbabilities, softmax, toPrediction } from '../probabilities'

describe('probabilities', () => {
  describe('softmax', () => {
    it('should match the normalised exponential', () => {
      const result = softmax([1, 2, 3])
      expect(result[0]).toBeCloseTo(0.09003057, 7)
      expect(result[1]).toBeCloseTo(0.24472847, 7)
      expect(result[2]).toBeCloseTo(0.66524096, 7)
    })

    it('should not overflow on large logits', () => {
      expect(softmax([1000, 1000])).toEqual([0.5, 0.5])
    })
  })

  describe('argmax', () => {
    it('should return the first index on ties', () => {
      expect(argmax([1, 3, 3])).toBe(1)
      expect(argmax([2, 2, 2])).toBe(0)
    })
  })

  describe('toPrediction', () => {
    it('should map probabilities onto categories in declaration order', () => {
      const prediction = toPrediction([0.05, 0.1, 0.5, 0.05, 0.1, 0.1, 0.05, 0.05])
      expect(prediction.label).toBe('Hot Spots')
      expect(prediction.confidence).toBe(0.5)
      expect(prediction.distribution['Potential Induced Degradation (PID)']).toBe(0.05)
      expect(Object.isFrozen(prediction)).toBe(true)
    })

    it('should reject the wrong number of probabilities', () => {
      expect(() => toPrediction([0.5, 0.5])).toThrow('Expected 8 probabilities, got 2')
    })
  })

  describe('rankProbabilities', () => {
    it('should sort descending and keep category order on ties', () => {
      const { distribution } = toPrediction([0.1, 0.2, 0.2, 0.1, 0.1, 0.1, 0.1, 0.1])
      expect(rankProbabilities(distribution).map((entry) => entry.label)).toEqual([
        'Microcracks',
        'Hot Spots',
        'Healthy Panel',
        'Snail Trails',
        'Cell Breakage',
        'Delamination',
        'Bypass Diode Failure',
        'Potential Induced Degradation (PID)',
      ])
    })
  })
})
