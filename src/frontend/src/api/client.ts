import axios from 'axios'
import { LoadError } from '../model/errors'

// Static assets are served from the app's own origin; nothing leaves it.
const client = axios.create({
  baseURL: import.meta.env.BASE_URL || '/',
})

// Model weights
export const fetchModelWeights = async (url: string): Promise<ArrayBuffer> => {
  try {
    const response = await client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' })
    return response.data
  } catch (error) {
    if (axios.isAxiosError(error) && error.response?.status === 404) {
      throw new LoadError(`Model weights not found at ${url}. Run "npm run create-model" first.`, {
        cause: error,
      })
    }
    throw new LoadError(`Could not fetch model weights from ${url}`, { cause: error })
  }
}

export default client
