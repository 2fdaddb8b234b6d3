import type { RasterImage } from '../types'

export const ACCEPTED_IMAGE_TYPES = ['image/jpeg', 'image/jpg', 'image/png'] as const

export function isAcceptedImageFile(file: File): boolean {
  return ACCEPTED_IMAGE_TYPES.some((type) => type === file.type)
}

/**
 * Decodes an uploaded JPEG/PNG into RGBA pixels at its natural size.
 */
export async function decodeImageFile(file: File): Promise<RasterImage> {
  const bitmap = await createImageBitmap(file)
  try {
    const canvas = document.createElement('canvas')
    canvas.width = bitmap.width
    canvas.height = bitmap.height
    const context = canvas.getContext('2d')
    if (!context) {
      throw new Error('Canvas 2D context is not available in this browser')
    }
    context.drawImage(bitmap, 0, 0)
    const { data, width, height } = context.getImageData(0, 0, bitmap.width, bitmap.height)
    return { width, height, channels: 4, data }
  } finally {
    bitmap.close()
  }
}

export function readAsDataUrl(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader()
    reader.onloadend = () => {
      if (typeof reader.result === 'string') {
        resolve(reader.result)
      } else {
        reject(new Error(`Could not read ${file.name}`))
      }
    }
    reader.onerror = () => reject(reader.error ?? new Error(`Could not read ${file.name}`))
    reader.readAsDataURL(file)
  })
}
