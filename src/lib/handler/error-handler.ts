import { ZodError } from 'zod'
import { ProposalValidationError } from '@/lib/proposal/errors'

/**
 * Handles errors by returning a string representation of the error.
 *
 * @param error - The error to handle, which can be of any type.
 * @returns A string representation of the error.
 */
export function errorHandler(error: unknown): string {
  if (error == null) {
    return 'unknown error'
  }

  if (typeof error === 'string') {
    return error
  }

  if (ProposalValidationError.isInstance(error)) {
    const details = error.issues.map((issue) => issue.message).join('; ')
    return details ? `${error.message}: ${details}` : error.message
  }

  if (error instanceof ZodError) {
    return 'Invalid proposal input'
  }

  if (error instanceof Error) {
    return error.message
  }

  return JSON.stringify(error)
}
