import { NextResponse } from 'next/server'
import { isAppError } from '@/lib/errors'
import { logError, warn } from '@/lib/utils/logger'

// ============================================================================
// Response Helpers
// ============================================================================

export function badRequest(message: string) {
  return NextResponse.json({ error: message }, { status: 400 })
}

export function success<T>(data: T, status = 200) {
  return NextResponse.json(data, { status })
}

// ============================================================================
// Request Helpers
// ============================================================================

/**
 * Reads a text field from a form body; file parts and missing fields are
 * treated as absent.
 */
export function formString(form: FormData, name: string): string | undefined {
  const value = form.get(name)
  return typeof value === 'string' ? value : undefined
}

export async function readForm(request: Request): Promise<FormData> {
  try {
    return await request.formData()
  } catch (error) {
    warn({ err: error }, 'Request body is not form data')
    return new FormData()
  }
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Convert any error to an appropriate NextResponse.
 *
 * @example
 * ```ts
 * try {
 *   await someOperation()
 * } catch (error) {
 *   return handleError(error, 'generate_json')
 * }
 * ```
 */
export function handleError(error: unknown, logPrefix?: string): NextResponse {
  if (isAppError(error)) {
    if (error.statusCode >= 500) {
      logError(error, { route: logPrefix, code: error.code })
    } else {
      warn({ route: logPrefix, code: error.code }, error.message)
    }
    return NextResponse.json(
      {
        error: error.message,
        code: error.code,
      },
      { status: error.statusCode }
    )
  }

  if (error instanceof Error) {
    logError(error, { route: logPrefix })
    return NextResponse.json(
      { error: error.message, code: 'INTERNAL_ERROR' },
      { status: 500 }
    )
  }

  logError(new Error(String(error)), { route: logPrefix })
  return NextResponse.json(
    { error: 'An unexpected error occurred', code: 'UNKNOWN_ERROR' },
    { status: 500 }
  )
}
