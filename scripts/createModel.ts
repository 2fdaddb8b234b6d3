/**
 * Writes an untrained ResNet-18 weight file for the fault classifier so the app
 * can run end to end. Predictions from these weights are meaningless; replace
 * the file with trained weights exported in the same layout.
 *
 * Usage: npm run create-model
 */
import fs from 'fs'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import { RESNET18, parameterSpecs, type ParameterSpec } from '../src/frontend/src/model/architecture'
import { serializeWeights, type NamedTensor } from '../src/frontend/src/model/weights'

const __dirname = dirname(fileURLToPath(import.meta.url))
const modelPath = resolve(__dirname, '../src/frontend/public/model/solar_model.safetensors')

function gaussian(): number {
  // Box-Muller
  const u = 1 - Math.random()
  const v = Math.random()
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v)
}

function initialise(spec: ParameterSpec): Float32Array {
  const size = spec.shape.reduce((total, dim) => total * dim, 1)
  const values = new Float32Array(size)
  switch (spec.init) {
    case 'ones':
      values.fill(1)
      break
    case 'zeros':
      break
    case 'kaiming': {
      // fan_out mode, as torchvision initialises ResNet convolutions
      const [out, , kh, kw] = spec.shape
      const std = Math.sqrt(2 / (out * kh * kw))
      for (let i = 0; i < size; i++) values[i] = gaussian() * std
      break
    }
    case 'linear': {
      const bound = 1 / Math.sqrt(spec.fanIn)
      for (let i = 0; i < size; i++) values[i] = (Math.random() * 2 - 1) * bound
      break
    }
  }
  return values
}

function main() {
  console.log('Creating ResNet-18 weights with random initialisation...')
  console.log('Note: this is a placeholder model. Train with your own data for real predictions.')

  const tensors: NamedTensor[] = parameterSpecs(RESNET18).map((spec) => ({
    name: spec.name,
    shape: spec.shape,
    data: initialise(spec),
  }))

  const buffer = serializeWeights(tensors, {
    architecture: 'resnet18',
    num_classes: String(RESNET18.numClasses),
    trained: 'false',
  })

  fs.mkdirSync(dirname(modelPath), { recursive: true })
  fs.writeFileSync(modelPath, new Uint8Array(buffer))

  const sizeMb = fs.statSync(modelPath).size / (1024 * 1024)
  console.log('Model saved successfully!')
  console.log(`   Location: ${modelPath}`)
  console.log(`   Size: ${sizeMb.toFixed(2)} MB`)
  console.log('\nYou can now run: npm run dev')
}

main()
