// Build-time configuration from Vite env, with defaults for local development.

export interface AppConfig {
  modelUrl: string
  inputSize: number
}

const DEFAULT_MODEL_URL = '/model/solar_model.safetensors'
const DEFAULT_INPUT_SIZE = 224

function parseInputSize(raw: string | undefined): number {
  if (!raw) return DEFAULT_INPUT_SIZE
  const value = Number.parseInt(raw, 10)
  if (!Number.isInteger(value) || value < 32) {
    console.warn(`Ignoring invalid VITE_MODEL_INPUT_SIZE "${raw}", using ${DEFAULT_INPUT_SIZE}`)
    return DEFAULT_INPUT_SIZE
  }
  return value
}

export const config: AppConfig = {
  modelUrl: import.meta.env.VITE_MODEL_URL || DEFAULT_MODEL_URL,
  inputSize: parseInputSize(import.meta.env.VITE_MODEL_INPUT_SIZE),
}
