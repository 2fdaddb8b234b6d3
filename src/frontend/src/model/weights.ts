import { z } from 'zod'
import { LoadError } from './errors'

/**
 * Weight files use the safetensors layout:
 *   [u64 little-endian header length][JSON header][raw tensor bytes]
 * Header entries map a tensor name to its dtype, shape and byte range relative
 * to the start of the data section. `__metadata__` holds free-form strings.
 */

export interface RawTensor {
  dtype: string
  shape: number[]
  /** Present for F32 tensors only; other dtypes are kept as opaque entries. */
  data?: Float32Array
}

export type WeightMap = ReadonlyMap<string, RawTensor>

const HEADER_LENGTH_BYTES = 8
const METADATA_KEY = '__metadata__'
// Guards against reading a garbage length as a multi-gigabyte header.
const MAX_HEADER_BYTES = 100 * 1024 * 1024

const DTYPE_SIZES: Record<string, number> = {
  F64: 8,
  F32: 4,
  F16: 2,
  BF16: 2,
  I64: 8,
  I32: 4,
  I16: 2,
  I8: 1,
  U8: 1,
  BOOL: 1,
}

const TensorEntrySchema = z.object({
  dtype: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  data_offsets: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
})

const HeaderSchema = z.record(z.string(), z.unknown())

function elementCount(shape: readonly number[]): number {
  return shape.reduce((total, dim) => total * dim, 1)
}

function readHeader(buffer: ArrayBuffer): { header: Record<string, unknown>; dataStart: number } {
  if (buffer.byteLength < HEADER_LENGTH_BYTES) {
    throw new LoadError('Weight file is too short to contain a header')
  }

  const headerLength = new DataView(buffer).getBigUint64(0, true)
  if (headerLength > BigInt(Math.min(MAX_HEADER_BYTES, buffer.byteLength - HEADER_LENGTH_BYTES))) {
    throw new LoadError(`Weight file header length ${headerLength} exceeds the file size`)
  }

  const dataStart = HEADER_LENGTH_BYTES + Number(headerLength)
  const text = new TextDecoder().decode(new Uint8Array(buffer, HEADER_LENGTH_BYTES, Number(headerLength)))

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new LoadError('Weight file header is not valid JSON', { cause: error })
  }

  const parsed = HeaderSchema.safeParse(json)
  if (!parsed.success) {
    throw new LoadError('Weight file header must be a JSON object')
  }
  return { header: parsed.data, dataStart }
}

export function parseWeights(buffer: ArrayBuffer): WeightMap {
  const { header, dataStart } = readHeader(buffer)
  const dataLength = buffer.byteLength - dataStart
  const tensors = new Map<string, RawTensor>()

  for (const [name, value] of Object.entries(header)) {
    if (name === METADATA_KEY) continue

    const entry = TensorEntrySchema.safeParse(value)
    if (!entry.success) {
      throw new LoadError(`Malformed header entry for tensor "${name}"`)
    }

    const { dtype, shape, data_offsets: [begin, end] } = entry.data
    const itemSize = DTYPE_SIZES[dtype]
    if (itemSize === undefined) {
      throw new LoadError(`Tensor "${name}" has unsupported dtype ${dtype}`)
    }
    if (begin > end || end > dataLength) {
      throw new LoadError(`Tensor "${name}" data range [${begin}, ${end}) is outside the file`)
    }
    if (end - begin !== elementCount(shape) * itemSize) {
      throw new LoadError(`Tensor "${name}" byte length does not match shape [${shape.join(', ')}]`)
    }

    // slice() copies, so the Float32Array is aligned regardless of the offset
    const data =
      dtype === 'F32' ? new Float32Array(buffer.slice(dataStart + begin, dataStart + end)) : undefined
    tensors.set(name, { dtype, shape, data })
  }

  return tensors
}

export interface NamedTensor {
  name: string
  shape: readonly number[]
  data: Float32Array
}

export function serializeWeights(
  tensors: readonly NamedTensor[],
  metadata: Record<string, string> = {}
): ArrayBuffer {
  const header: Record<string, unknown> = { [METADATA_KEY]: metadata }
  let offset = 0
  for (const tensor of tensors) {
    if (tensor.data.length !== elementCount(tensor.shape)) {
      throw new Error(`Tensor "${tensor.name}" has ${tensor.data.length} values for shape [${tensor.shape.join(', ')}]`)
    }
    const byteLength = tensor.data.length * 4
    header[tensor.name] = { dtype: 'F32', shape: [...tensor.shape], data_offsets: [offset, offset + byteLength] }
    offset += byteLength
  }

  // Space padding keeps the data section 8-byte aligned.
  const encoder = new TextEncoder()
  const json = JSON.stringify(header)
  const padding = (8 - (encoder.encode(json).length % 8)) % 8
  const headerBytes = encoder.encode(json + ' '.repeat(padding))

  const output = new ArrayBuffer(HEADER_LENGTH_BYTES + headerBytes.length + offset)
  new DataView(output).setBigUint64(0, BigInt(headerBytes.length), true)
  const bytes = new Uint8Array(output)
  bytes.set(headerBytes, HEADER_LENGTH_BYTES)

  let cursor = HEADER_LENGTH_BYTES + headerBytes.length
  for (const tensor of tensors) {
    new Float32Array(output, cursor, tensor.data.length).set(tensor.data)
    cursor += tensor.data.byteLength
  }
  return output
}

/**
 * Returns the F32 values for `name`, checking the stored shape against the
 * one the architecture declares.
 */
export function takeTensor(weights: WeightMap, name: string, expectedShape: readonly number[]): Float32Array {
  const tensor = weights.get(name)
  if (!tensor) {
    throw new LoadError(`Weight file is missing parameter "${name}"`)
  }
  if (tensor.dtype !== 'F32' || !tensor.data) {
    throw new LoadError(`Parameter "${name}" must be F32, found ${tensor.dtype}`)
  }
  const matches =
    tensor.shape.length === expectedShape.length && tensor.shape.every((dim, i) => dim === expectedShape[i])
  if (!matches) {
    throw new LoadError(
      `Parameter "${name}" has shape [${tensor.shape.join(', ')}], expected [${expectedShape.join(', ')}]`
    )
  }
  return tensor.data
}
