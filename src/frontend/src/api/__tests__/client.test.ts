import { afterEach, describe, it, expect, vi } from 'vitest'
import { AxiosError, AxiosHeaders } from 'axios'
import client, { fetchModelWeights } from '../client'
import { LoadError } from '../../model/errors'

const requestConfig = { headers: new AxiosHeaders() }

describe('fetchModelWeights', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should request the file as an array buffer', async () => {
    const buffer = new ArrayBuffer(8)
    const get = vi.spyOn(client, 'get').mockResolvedValueOnce({
      data: buffer,
      status: 200,
      statusText: 'OK',
      headers: {},
      config: requestConfig,
    })

    await expect(fetchModelWeights('/model/test.safetensors')).resolves.toBe(buffer)
    expect(get).toHaveBeenCalledWith('/model/test.safetensors', { responseType: 'arraybuffer' })
  })

  it('should point at the setup script when the file is missing', async () => {
    const notFound = new AxiosError('Request failed with status code 404', AxiosError.ERR_BAD_REQUEST, requestConfig, null, {
      data: null,
      status: 404,
      statusText: 'Not Found',
      headers: {},
      config: requestConfig,
    })
    vi.spyOn(client, 'get').mockRejectedValueOnce(notFound)

    const failure = fetchModelWeights('/model/solar_model.safetensors')
    await expect(failure).rejects.toThrow(LoadError)
    await expect(failure).rejects.toThrow(
      'Model weights not found at /model/solar_model.safetensors. Run "npm run create-model" first.'
    )
  })

  it('should wrap a network error in a LoadError', async () => {
    const offline = new AxiosError('Network Error', AxiosError.ERR_NETWORK, requestConfig)
    vi.spyOn(client, 'get').mockRejectedValueOnce(offline)

    const failure = fetchModelWeights('/model/solar_model.safetensors')
    await expect(failure).rejects.toThrow(LoadError)
    await expect(failure).rejects.toThrow('Could not fetch model weights from /model/solar_model.safetensors')
    await expect(failure).rejects.toHaveProperty('cause', offline)
  })
})
