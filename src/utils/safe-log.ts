/**
 * Safe error logging utility.
 *
 * Provider URLs carry the OpenWeatherMap key as `appid=`, and a failed fetch
 * echoes the URL back in its message. Everything passed through safeError is
 * scrubbed of keys; in production stack traces are dropped as well.
 */

const SECRET_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/([?&]appid=)[^&\s"']+/gi, '$1***'],
  [/\bgsk_[A-Za-z0-9]+/g, 'gsk_***'],
  [/(postgres(?:ql)?:\/\/[^:\s/]+:)[^@\s]+@/gi, '$1***@'],
]

export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text)
}

export interface SafeErrorShape {
  name: string
  message: string
  stack?: string
}

export function safeError(error: unknown, env: string | undefined = process.env.NODE_ENV): SafeErrorShape | string {
  const production = env === 'production'

  if (error instanceof Error) {
    const shape: SafeErrorShape = { name: error.name, message: redactSecrets(error.message) }
    if (!production && error.stack) shape.stack = redactSecrets(error.stack)
    return shape
  }

  if (typeof error === 'string') {
    return redactSecrets(error)
  }

  return production ? '[non-Error thrown]' : redactSecrets(String(error))
}
