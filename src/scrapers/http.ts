export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

export interface FetchOptions {
  method?: string
  headers?: Record<string, string>
  body?: URLSearchParams | string
  timeoutMs?: number
}

const DEFAULT_TIMEOUT_MS = 15000

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`)
    this.name = 'HttpError'
  }
}

export type ResponseReader<T> = (response: Response) => Promise<T>

// Single attempt. The timeout covers the headers and whatever `read` consumes of the body.
export async function fetchWithTimeout<T>(
  url: string,
  options: FetchOptions,
  read: ResponseReader<T>
): Promise<T> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, ...init } = options

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await fetch(url, { ...init, signal: controller.signal })
    return await read(response)
  } finally {
    clearTimeout(timeoutId)
  }
}

export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const requestOptions: FetchOptions = {
    ...options,
    headers: {
      'User-Agent': BROWSER_USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      ...options.headers,
    },
  }

  return fetchWithTimeout(url, requestOptions, async (response) => {
    if (!response.ok) {
      throw new HttpError(response.status, response.statusText)
    }
    return response.text()
  })
}
