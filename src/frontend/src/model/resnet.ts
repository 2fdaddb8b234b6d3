import * as tf from '@tensorflow/tfjs'
import { blockLayouts, featureCount, type ResNetArchitecture } from './architecture'
import { LoadError } from './errors'
import { takeTensor, type WeightMap } from './weights'

const BATCH_NORM_EPSILON = 1e-5

interface BatchNormParams {
  mean: tf.Tensor1D
  variance: tf.Tensor1D
  offset: tf.Tensor1D
  scale: tf.Tensor1D
}

interface ConvBn {
  filter: tf.Tensor4D
  stride: number
  pad: number
  bn: BatchNormParams
}

interface BasicBlock {
  conv1: ConvBn
  conv2: ConvBn
  downsample?: ConvBn
}

export interface ResNetParams {
  stem: ConvBn
  stages: BasicBlock[][]
  fc: {
    /** Stored transposed, [features, classes]. */
    weight: tf.Tensor2D
    bias: tf.Tensor1D
  }
}

/**
 * Turns state-dict tensors into tfjs tensors in the layouts the ops expect,
 * remembering everything it creates so a failed build can release it.
 */
class ParameterReader {
  readonly created: tf.Tensor[] = []

  constructor(private readonly weights: WeightMap) {}

  private keep<T extends tf.Tensor>(tensor: T): T {
    this.created.push(tensor)
    return tensor
  }

  vector(name: string, length: number): tf.Tensor1D {
    return this.keep(tf.tensor1d(takeTensor(this.weights, name, [length]), 'float32'))
  }

  /** Linear weight [out, in], returned transposed as [in, out]. */
  linear(name: string, shape: [number, number]): tf.Tensor2D {
    const values = takeTensor(this.weights, name, shape)
    return this.keep(tf.tidy(() => tf.transpose(tf.tensor2d(values, shape, 'float32'))))
  }

  batchNorm(prefix: string, channels: number): BatchNormParams {
    return {
      scale: this.vector(`${prefix}.weight`, channels),
      offset: this.vector(`${prefix}.bias`, channels),
      mean: this.vector(`${prefix}.running_mean`, channels),
      variance: this.vector(`${prefix}.running_var`, channels),
    }
  }

  convBn(convName: string, bnPrefix: string, shape: [number, number, number, number], stride: number): ConvBn {
    const [out, , kernel] = shape
    const values = takeTensor(this.weights, convName, shape)
    // [out, in, kh, kw] -> [kh, kw, in, out]
    const filter = this.keep(tf.tidy(() => tf.transpose(tf.tensor4d(values, shape, 'float32'), [2, 3, 1, 0])))
    return { filter, stride, pad: Math.floor(kernel / 2), bn: this.batchNorm(bnPrefix, out) }
  }
}

/**
 * Builds the network parameters from a weight map. Throws LoadError on the
 * first missing or mis-shaped parameter; tensors created before the failure
 * are released.
 */
export function buildResNet(weights: WeightMap, architecture: ResNetArchitecture): ResNetParams {
  const reader = new ParameterReader(weights)

  try {
    const width = architecture.baseWidth
    const stem = reader.convBn('conv1.weight', 'bn1', [width, 3, 7, 7], 2)

    const stages = blockLayouts(architecture).map((stage) =>
      stage.map((block): BasicBlock => {
        const { prefix, inChannels, outChannels, stride } = block
        return {
          conv1: reader.convBn(`${prefix}.conv1.weight`, `${prefix}.bn1`, [outChannels, inChannels, 3, 3], stride),
          conv2: reader.convBn(`${prefix}.conv2.weight`, `${prefix}.bn2`, [outChannels, outChannels, 3, 3], 1),
          downsample: block.hasDownsample
            ? reader.convBn(
                `${prefix}.downsample.0.weight`,
                `${prefix}.downsample.1`,
                [outChannels, inChannels, 1, 1],
                stride
              )
            : undefined,
        }
      })
    )

    const fc = {
      weight: reader.linear('fc.weight', [architecture.numClasses, featureCount(architecture)]),
      bias: reader.vector('fc.bias', architecture.numClasses),
    }

    return { stem, stages, fc }
  } catch (error) {
    tf.dispose(reader.created)
    if (error instanceof LoadError) throw error
    throw new LoadError('Could not build the network from the weight file', { cause: error })
  }
}

function collectTensors(value: unknown, into: tf.Tensor[]): void {
  if (value instanceof tf.Tensor) {
    into.push(value)
  } else if (value && typeof value === 'object') {
    for (const child of Object.values(value)) collectTensors(child, into)
  }
}

export function disposeResNet(params: ResNetParams): void {
  const tensors: tf.Tensor[] = []
  collectTensors(params, tensors)
  tf.dispose(tensors)
}

function applyConvBn(x: tf.Tensor4D, layer: ConvBn): tf.Tensor4D {
  const conv = tf.conv2d(x, layer.filter, layer.stride, layer.pad)
  return tf.batchNorm(conv, layer.bn.mean, layer.bn.variance, layer.bn.offset, layer.bn.scale, BATCH_NORM_EPSILON)
}

function applyBlock(x: tf.Tensor4D, block: BasicBlock): tf.Tensor4D {
  const residual = block.downsample ? applyConvBn(x, block.downsample) : x
  const out = applyConvBn(tf.relu(applyConvBn(x, block.conv1)), block.conv2)
  return tf.relu(tf.add<tf.Tensor4D>(out, residual))
}

/** Forward pass in evaluation mode. `input` is NHWC, normalised. Returns logits [batch, classes]. */
export function forward(params: ResNetParams, input: tf.Tensor4D): tf.Tensor2D {
  return tf.tidy(() => {
    let x = tf.relu(applyConvBn(input, params.stem))
    x = tf.maxPool(x, 3, 2, 1)
    for (const stage of params.stages) {
      for (const block of stage) {
        x = applyBlock(x, block)
      }
    }
    const pooled = tf.mean<tf.Tensor2D>(x, [1, 2])
    return tf.add<tf.Tensor2D>(tf.matMul(pooled, params.fc.weight), params.fc.bias)
  })
}
