// Utility for rate limiting and delays

export type Sleep = (ms: number) => Promise<void>

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
