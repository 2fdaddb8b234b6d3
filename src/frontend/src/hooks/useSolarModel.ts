import { useMutation, useQuery } from '@tanstack/react-query'
import { loadModel, predict, type SolarModel } from '../model/classifier'
import { decodeImageFile } from '../lib/image'
import type { FaultPrediction } from '../types'

export const MODEL_QUERY_KEY = ['solar-model'] as const

/**
 * Loads the classifier once per page lifetime; every component shares the
 * cached handle.
 */
export function useSolarModel() {
  return useQuery({
    queryKey: MODEL_QUERY_KEY,
    queryFn: async () => {
      try {
        return await loadModel()
      } catch (error) {
        console.error('Failed to load fault classifier', error)
        throw error
      }
    },
    staleTime: Infinity,
    gcTime: Infinity,
    retry: false,
  })
}

export function usePrediction(model: SolarModel | undefined) {
  return useMutation({
    mutationFn: async (file: File): Promise<FaultPrediction> => {
      if (!model) {
        throw new Error('The classifier is not loaded yet')
      }
      const image = await decodeImageFile(file)
      return predict(image, model)
    },
  })
}
