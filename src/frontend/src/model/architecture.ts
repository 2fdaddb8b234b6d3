import { FAULT_CATEGORIES } from '../types'

/**
 * Shape of a torchvision-style ResNet built from basic (two 3x3 conv) blocks.
 * Parameter names follow the torchvision state dict so the same weight file
 * layout works for any width.
 */
export interface ResNetArchitecture {
  stageBlocks: readonly number[]
  baseWidth: number
  numClasses: number
}

export const RESNET18: ResNetArchitecture = {
  stageBlocks: [2, 2, 2, 2],
  baseWidth: 64,
  numClasses: FAULT_CATEGORIES.length,
}

export type ParameterInit = 'kaiming' | 'ones' | 'zeros' | 'linear'

export interface ParameterSpec {
  name: string
  shape: readonly number[]
  init: ParameterInit
  /** Fan-in used by the initialiser. */
  fanIn: number
}

export interface BlockLayout {
  prefix: string
  inChannels: number
  outChannels: number
  stride: number
  hasDownsample: boolean
}

export function stageChannels(architecture: ResNetArchitecture, stage: number): number {
  return architecture.baseWidth * 2 ** stage
}

export function featureCount(architecture: ResNetArchitecture): number {
  return stageChannels(architecture, architecture.stageBlocks.length - 1)
}

export function blockLayouts(architecture: ResNetArchitecture): BlockLayout[][] {
  return architecture.stageBlocks.map((blocks, stage) => {
    const outChannels = stageChannels(architecture, stage)
    const stageInput = stage === 0 ? architecture.baseWidth : stageChannels(architecture, stage - 1)

    return Array.from({ length: blocks }, (_, index) => {
      const inChannels = index === 0 ? stageInput : outChannels
      const stride = stage > 0 && index === 0 ? 2 : 1
      return {
        prefix: `layer${stage + 1}.${index}`,
        inChannels,
        outChannels,
        stride,
        hasDownsample: stride !== 1 || inChannels !== outChannels,
      }
    })
  })
}

function convSpec(name: string, out: number, inChannels: number, kernel: number): ParameterSpec {
  return {
    name,
    shape: [out, inChannels, kernel, kernel],
    init: 'kaiming',
    fanIn: inChannels * kernel * kernel,
  }
}

function batchNormSpecs(prefix: string, channels: number): ParameterSpec[] {
  return [
    { name: `${prefix}.weight`, shape: [channels], init: 'ones', fanIn: channels },
    { name: `${prefix}.bias`, shape: [channels], init: 'zeros', fanIn: channels },
    { name: `${prefix}.running_mean`, shape: [channels], init: 'zeros', fanIn: channels },
    { name: `${prefix}.running_var`, shape: [channels], init: 'ones', fanIn: channels },
  ]
}

/** Every learned parameter of the network, in state-dict order. */
export function parameterSpecs(architecture: ResNetArchitecture): ParameterSpec[] {
  const width = architecture.baseWidth
  const specs: ParameterSpec[] = [convSpec('conv1.weight', width, 3, 7), ...batchNormSpecs('bn1', width)]

  for (const stage of blockLayouts(architecture)) {
    for (const block of stage) {
      specs.push(
        convSpec(`${block.prefix}.conv1.weight`, block.outChannels, block.inChannels, 3),
        ...batchNormSpecs(`${block.prefix}.bn1`, block.outChannels),
        convSpec(`${block.prefix}.conv2.weight`, block.outChannels, block.outChannels, 3),
        ...batchNormSpecs(`${block.prefix}.bn2`, block.outChannels)
      )
      if (block.hasDownsample) {
        specs.push(
          convSpec(`${block.prefix}.downsample.0.weight`, block.outChannels, block.inChannels, 1),
          ...batchNormSpecs(`${block.prefix}.downsample.1`, block.outChannels)
        )
      }
    }
  }

  const features = featureCount(architecture)
  specs.push(
    { name: 'fc.weight', shape: [architecture.numClasses, features], init: 'linear', fanIn: features },
    { name: 'fc.bias', shape: [architecture.numClasses], init: 'linear', fanIn: features }
  )
  return specs
}
