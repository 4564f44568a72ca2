/**
 * fetch helpers shared by the detector, LLM and geocoding clients
 */
import { errorMessage } from '@/lib/errors'

export const DEFAULT_REQUEST_TIMEOUT = 30000 // 30 seconds for regular API requests

type RequestSignalBundle = {
  signal: AbortSignal
  isCanceled: () => boolean
}

/**
 * Combine a caller's cancel signal with a timeout. The combined signal takes
 * the reason of whichever fired first, which tells a cancel from a timeout.
 */
export function createRequestSignal(parentSignal: AbortSignal | undefined, timeoutMs: number): RequestSignalBundle {
  const timeoutSignal = AbortSignal.timeout(timeoutMs)
  if (!parentSignal) {
    return { signal: timeoutSignal, isCanceled: () => false }
  }

  const signal = AbortSignal.any([parentSignal, timeoutSignal])
  return {
    signal,
    isCanceled: () => parentSignal.aborted && signal.reason === parentSignal.reason,
  }
}

export type HttpFailure =
  | { kind: 'status'; status: number; message: string }
  | { kind: 'timeout' }
  | { kind: 'canceled' }
  | { kind: 'network'; message: string }

/**
 * Error raised by requestJson. Callers translate it into their own
 * error type with `describeFailure`.
 */
export class HttpRequestError extends Error {
  constructor(public failure: HttpFailure, public timeoutMs: number) {
    super(describeFailure(failure, timeoutMs))
    this.name = 'HttpRequestError'
  }
}

export function describeFailure(failure: HttpFailure, timeoutMs: number): string {
  switch (failure.kind) {
    case 'status':
      return failure.message || `Request failed with status ${failure.status}`
    case 'timeout':
      return `Request timed out after ${timeoutMs / 1000} seconds`
    case 'canceled':
      return 'Request canceled'
    case 'network':
      return failure.message
  }
}

export async function requestJson(
  url: string,
  init: RequestInit = {},
  timeoutMs = DEFAULT_REQUEST_TIMEOUT
): Promise<unknown> {
  const requestSignal = createRequestSignal(init.signal ?? undefined, timeoutMs)

  try {
    const response = await fetch(url, {
      ...init,
      signal: requestSignal.signal,
    })
    if (!response.ok) {
      const message = await response.text()
      throw new HttpRequestError({ kind: 'status', status: response.status, message }, timeoutMs)
    }
    return await response.json()
  } catch (error) {
    if (error instanceof HttpRequestError) {
      throw error
    }
    if (requestSignal.signal.aborted) {
      throw new HttpRequestError({ kind: requestSignal.isCanceled() ? 'canceled' : 'timeout' }, timeoutMs)
    }
    throw new HttpRequestError({ kind: 'network', message: errorMessage(error) }, timeoutMs)
  }
}
