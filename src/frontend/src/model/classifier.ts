import * as tf from '@tensorflow/tfjs'
import { fetchModelWeights } from '../api/client'
import { config } from '../config'
import type { FaultPrediction, RasterImage } from '../types'
import { RESNET18, type ResNetArchitecture } from './architecture'
import { LoadError } from './errors'
import { buildResNet, disposeResNet, forward, type ResNetParams } from './resnet'
import { parseWeights } from './weights'
import { CLASS_NAMES, softmax, toPrediction } from './probabilities'

// ImageNet statistics, RGB order
export const NORMALIZE_MEAN = [0.485, 0.456, 0.406] as const
export const NORMALIZE_STD = [0.229, 0.224, 0.225] as const

export interface SolarModel {
  readonly architecture: ResNetArchitecture
  readonly inputSize: number
  readonly params: ResNetParams
}

export function loadModelFromBuffer(
  buffer: ArrayBuffer,
  architecture: ResNetArchitecture = RESNET18,
  inputSize: number = config.inputSize
): SolarModel {
  if (architecture.numClasses !== CLASS_NAMES.length) {
    throw new LoadError(
      `Architecture declares ${architecture.numClasses} classes but there are ${CLASS_NAMES.length} fault categories`
    )
  }
  const weights = parseWeights(buffer)
  const params = buildResNet(weights, architecture)
  return Object.freeze({ architecture, inputSize, params })
}

/**
 * Fetches and builds the classifier. Meant to be called once; the returned
 * handle is read-only and shared by every prediction.
 */
export async function loadModel(url: string = config.modelUrl): Promise<SolarModel> {
  const buffer = await fetchModelWeights(url)
  const model = loadModelFromBuffer(buffer)
  console.info(`Loaded fault classifier from ${url} (${(buffer.byteLength / (1024 * 1024)).toFixed(2)} MB)`)
  return model
}

export function disposeModel(model: SolarModel): void {
  disposeResNet(model.params)
}

/**
 * Resize to inputSize x inputSize, scale to [0, 1], then normalise each
 * channel. Alpha is dropped. Output is NHWC with a batch of one.
 *
 * Large images are first shrunk by area averaging over whole-number blocks so
 * every source pixel contributes; bilinear sampling covers the remainder.
 */
export function preprocess(image: RasterImage, inputSize: number): tf.Tensor4D {
  const { width, height, channels, data } = image
  if (width <= 0 || height <= 0 || data.length !== width * height * channels) {
    throw new RangeError(`Image data does not match ${width}x${height}x${channels}`)
  }

  return tf.tidy(() => {
    const pixels = tf.tensor3d(Int32Array.from(data), [height, width, channels], 'int32')
    const rgb = channels === 4 ? tf.slice(pixels, [0, 0, 0], [height, width, 3]) : pixels
    const blockHeight = Math.max(1, Math.floor(height / inputSize))
    const blockWidth = Math.max(1, Math.floor(width / inputSize))
    const shrunk =
      blockHeight > 1 || blockWidth > 1
        ? tf.avgPool(tf.cast(rgb, 'float32'), [blockHeight, blockWidth], [blockHeight, blockWidth], 'valid')
        : tf.cast(rgb, 'float32')
    const resized = tf.image.resizeBilinear(shrunk, [inputSize, inputSize], false, true)
    const scaled = tf.div(resized, 255)
    const normalized = tf.div(tf.sub(scaled, tf.tensor1d([...NORMALIZE_MEAN])), tf.tensor1d([...NORMALIZE_STD]))
    return tf.expandDims<tf.Tensor4D>(normalized, 0)
  })
}

export function predict(image: RasterImage, model: SolarModel): FaultPrediction {
  const logits = tf.tidy(() => forward(model.params, preprocess(image, model.inputSize)))
  try {
    return toPrediction(softmax(Array.from(logits.dataSync())))
  } finally {
    logits.dispose()
  }
}
