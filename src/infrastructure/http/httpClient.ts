/**
 * Shared HTTP client for upstream API calls (FIRMS, BigDataCloud).
 * Uses native fetch; in Lambda, AWS handles connection reuse.
 */

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export class RequestTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`)
    this.name = "RequestTimeoutError"
  }
}

/**
 * Fetch and read the response within timeoutMs. The deadline covers the body
 * read as well as the headers: on expiry the request is aborted and the call
 * rejects with RequestTimeoutError, whether or not the body stream ends.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
  fetchFn: FetchFn = fetch
): Promise<T> {
  const abortController = new AbortController()
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined

  const deadline = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      abortController.abort()
      reject(new RequestTimeoutError(timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([
      fetchFn(url, { ...options, signal: abortController.signal }).then(read),
      deadline,
    ])
  } finally {
    clearTimeout(timeoutHandle)
  }
}

export const shouldRetryHttpStatus = (httpStatus: number): boolean =>
  httpStatus === 408 || httpStatus === 429 || httpStatus >= 500
