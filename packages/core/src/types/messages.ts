import { z } from 'zod';
import { ErrorCodes } from '../errors/index.js';
import { DEPARTMENTS, type Department } from './department.js';

/** Byte width of a frame length prefix and of the declared file length */
export const LENGTH_FIELD_BYTES = 4;

/** Largest value the 4-byte declared length can carry */
export const MAX_DECLARED_LENGTH = 0xffffffff;

/**
 * Upper bound, in bytes, of each framed field.
 */
export const FIELD_LIMITS = {
  username: 31,
  password: 31,
  department: 31,
  filename: 255,
  response: 4096,
} as const;

export type FieldName = keyof typeof FIELD_LIMITS;

export const AUTH_SUCCESS_MARKER = 'Authentication successful';
export const TRANSFER_SUCCESS_MARKER = 'successfully transferred';

// ========== Responses ==========

export const okResponseSchema = z.object({
  status: z.literal('ok'),
  message: z.string(),
  department: z.enum(DEPARTMENTS).optional(),
  filename: z.string().optional(),
  bytes: z.number().int().nonnegative().optional(),
});

export const errorResponseSchema = z.object({
  status: z.literal('error'),
  code: z.nativeEnum(ErrorCodes),
  message: z.string(),
  hint: z.string().optional(),
});

export const serverResponseSchema = z.discriminatedUnion('status', [
  okResponseSchema,
  errorResponseSchema,
]);

export type OkResponse = z.infer<typeof okResponseSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;
export type ServerResponse = z.infer<typeof serverResponseSchema>;

export function authenticatedResponse(department: Department): OkResponse {
  return {
    status: 'ok',
    message: `${AUTH_SUCCESS_MARKER}. Department: ${department}`,
    department,
  };
}

/**
 * Sent once the destination is open; the client streams only after this.
 */
export function readyResponse(filename: string, bytes: number): OkResponse {
  return {
    status: 'ok',
    message: `Ready to receive ${bytes} bytes for '${filename}'`,
    filename,
    bytes,
  };
}

export function transferredResponse(
  filename: string,
  department: Department,
  bytes: number,
): OkResponse {
  return {
    status: 'ok',
    message: `File '${filename}' ${TRANSFER_SUCCESS_MARKER} to ${department} department`,
    filename,
    department,
    bytes,
  };
}

export function isAuthSuccess(response: ServerResponse): response is OkResponse {
  return response.status === 'ok' && response.message.includes(AUTH_SUCCESS_MARKER);
}

export function isTransferSuccess(response: ServerResponse): response is OkResponse {
  return response.status === 'ok' && response.message.includes(TRANSFER_SUCCESS_MARKER);
}
