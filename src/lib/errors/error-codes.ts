export const ErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  VCENTER_AUTH_FAILED: 'VCENTER_AUTH_FAILED',
  VCENTER_PERMISSION_DENIED: 'VCENTER_PERMISSION_DENIED',
  VCENTER_NETWORK_ERROR: 'VCENTER_NETWORK_ERROR',
  VCENTER_BAD_RESPONSE: 'VCENTER_BAD_RESPONSE',
  VCENTER_SOAP_FAULT: 'VCENTER_SOAP_FAULT',
  HOST_NOT_FOUND: 'HOST_NOT_FOUND',
  REPORT_WRITE_FAILED: 'REPORT_WRITE_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
