/**
 * OPC UA status code classification
 *
 * Maps raw status codes returned by the server onto a small set of categories
 * and the GOOD / UNCERTAIN / BAD quality levels used in readings.
 */

import type { StatusCode } from 'node-opcua-client';

export type StatusCategory =
  | 'GOOD'
  | 'NODE_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'TYPE_MISMATCH'
  | 'SESSION_CLOSED'
  | 'COMMUNICATION_ERROR'
  | 'TIMEOUT'
  | 'OTHER';

export type Quality = 'GOOD' | 'UNCERTAIN' | 'BAD';

const CATEGORY_PATTERNS: Array<[StatusCategory, string[]]> = [
  ['NODE_NOT_FOUND', ['BadNodeIdUnknown', 'BadNodeIdInvalid', 'BadAttributeIdInvalid']],
  ['ACCESS_DENIED', ['BadUserAccessDenied', 'BadNotReadable', 'BadNotWritable']],
  ['TYPE_MISMATCH', ['BadTypeMismatch', 'BadOutOfRange']],
  ['SESSION_CLOSED', ['BadSessionClosed', 'BadSessionIdInvalid', 'BadSecureChannelClosed']],
  ['COMMUNICATION_ERROR', ['BadCommunicationError', 'BadConnectionClosed', 'BadNotConnected', 'BadServerHalted']],
  ['TIMEOUT', ['BadTimeout', 'BadRequestTimeout']],
];

/**
 * Severity lives in the two top bits of the status code: 00 good, 01 uncertain, 1x bad
 */
export function determineQuality(statusCode: StatusCode): Quality {
  const severity = statusCode.value >>> 30;
  if (severity === 0) {
    return 'GOOD';
  }
  return severity === 1 ? 'UNCERTAIN' : 'BAD';
}

export function describeStatus(statusCode: StatusCode): StatusCategory {
  if (determineQuality(statusCode) === 'GOOD') {
    return 'GOOD';
  }

  const statusName = statusCode.name;
  for (const [category, patterns] of CATEGORY_PATTERNS) {
    if (patterns.some(pattern => statusName.includes(pattern))) {
      return category;
    }
  }

  return 'OTHER';
}
