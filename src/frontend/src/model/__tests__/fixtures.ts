import { parameterSpecs, type ResNetArchitecture } from '../architecture'
import { serializeWeights, type NamedTensor } from '../weights'
import type { RasterImage } from '../../types'

export const TINY_RESNET: ResNetArchitecture = {
  stageBlocks: [1, 1, 1, 1],
  baseWidth: 2,
  numClasses: 8,
}

/** Small deterministic PRNG so generated weights are the same on every run. */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomTensors(architecture: ResNetArchitecture, seed = 1): NamedTensor[] {
  const random = mulberry32(seed)
  return parameterSpecs(architecture).map((spec) => {
    const size = spec.shape.reduce((total, dim) => total * dim, 1)
    const data = new Float32Array(size)
    for (let i = 0; i < size; i++) {
      data[i] = spec.init === 'ones' ? 1 : spec.init === 'zeros' ? 0 : (random() * 2 - 1) * 0.5
    }
    return { name: spec.name, shape: spec.shape, data }
  })
}

/**
 * Weights where every convolution is zero, so the pooled features are zero and
 * the logits equal the final bias.
 */
export function biasOnlyTensors(architecture: ResNetArchitecture, bias: number[]): NamedTensor[] {
  return parameterSpecs(architecture).map((spec) => {
    const size = spec.shape.reduce((total, dim) => total * dim, 1)
    const data = new Float32Array(size)
    if (spec.name === 'fc.bias') data.set(bias)
    else if (spec.init === 'ones') data.fill(1)
    return { name: spec.name, shape: spec.shape, data }
  })
}

export function tinyWeightFile(seed = 1): ArrayBuffer {
  return serializeWeights(randomTensors(TINY_RESNET, seed))
}

export function randomImage(width: number, height: number, channels: 3 | 4, seed = 7): RasterImage {
  const random = mulberry32(seed)
  const data = new Uint8Array(width * height * channels)
  for (let i = 0; i < data.length; i++) data[i] = Math.floor(random() * 256)
  return { width, height, channels, data }
}

export function solidImage(width: number, height: number, rgb: [number, number, number]): RasterImage {
  const data = new Uint8Array(width * height * 3)
  for (let i = 0; i < width * height; i++) data.set(rgb, i * 3)
  return { width, height, channels: 3, data }
}
