import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorMessage } from '@/lib/errors/error';

import { parseSoapFault } from './xml';

import type { AppError } from '@/lib/errors/error';

const BODY_EXCERPT_LIMIT = 500;

function excerpt(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > BODY_EXCERPT_LIMIT ? trimmed.slice(0, BODY_EXCERPT_LIMIT) : trimmed;
}

const AUTH_FAULTS = new Set(['InvalidLoginFault', 'NotAuthenticatedFault', 'InvalidLocaleFault']);
const PERMISSION_FAULTS = new Set(['NoPermissionFault', 'RestrictedVersionFault']);

/** Maps a non-2xx vCenter response (REST or SOAP) to an `AppError`. */
export function toHttpError(input: { op: string; status: number; bodyText: string }): AppError {
  const fault = parseSoapFault(input.bodyText);
  const context = {
    op: input.op,
    status: input.status,
    ...(fault?.faultString ? { fault: fault.faultString } : {}),
    ...(fault?.faultType ? { fault_type: fault.faultType } : {}),
    ...(input.bodyText && !fault ? { body_excerpt: excerpt(input.bodyText) } : {}),
  };

  if (input.status === 401 || (fault?.faultType && AUTH_FAULTS.has(fault.faultType))) {
    return {
      code: ErrorCode.VCENTER_AUTH_FAILED,
      category: 'auth',
      message: 'authentication failed',
      retryable: false,
      redacted_context: context,
    };
  }
  if (input.status === 403 || (fault?.faultType && PERMISSION_FAULTS.has(fault.faultType))) {
    return {
      code: ErrorCode.VCENTER_PERMISSION_DENIED,
      category: 'permission',
      message: 'permission denied',
      retryable: false,
      redacted_context: context,
    };
  }
  if (fault) {
    return {
      code: ErrorCode.VCENTER_SOAP_FAULT,
      category: 'parse',
      message: `${input.op} returned a SOAP fault`,
      retryable: false,
      redacted_context: context,
    };
  }
  return {
    code: ErrorCode.VCENTER_BAD_RESPONSE,
    category: input.status >= 500 ? 'network' : 'parse',
    message: `${input.op} failed with status ${input.status}`,
    retryable: input.status >= 500,
    redacted_context: context,
  };
}

export function httpError(input: { op: string; status: number; bodyText: string }): AppErrorException {
  return new AppErrorException(toHttpError(input));
}

export function networkError(op: string, url: string, err: unknown): AppErrorException {
  const timeout = err instanceof Error && err.name === 'AbortError';
  return new AppErrorException({
    code: ErrorCode.VCENTER_NETWORK_ERROR,
    category: 'network',
    message: timeout ? `${op} timed out` : `${op} request failed`,
    retryable: true,
    redacted_context: { op, url, cause: errorMessage(err) },
  });
}

export function badResponseError(op: string, detail?: string): AppErrorException {
  return new AppErrorException({
    code: ErrorCode.VCENTER_BAD_RESPONSE,
    category: 'parse',
    message: `${op} returned unexpected response`,
    retryable: false,
    redacted_context: { op, ...(detail ? { detail } : {}) },
  });
}
