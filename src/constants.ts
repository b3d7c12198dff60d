/**
 * Application constants
 * 
 * Why: URL conventions, default endpoints and status codes are shared by the
 * schema generator and the REST client. Keeping them here keeps both in step.
 */

/**
 * HTTP status codes
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Statuses the REST client treats as success
 */
export const ACCEPTED_STATUSES: readonly number[] = [
  HTTP_STATUS.OK,
  HTTP_STATUS.CREATED,
  HTTP_STATUS.ACCEPTED,
  HTTP_STATUS.NO_CONTENT,
];

/**
 * Internal API version prefix removed from path tokens
 */
export const API_VERSION_PREFIX = 'pulp/api/v3/';

export const OPENAPI_VERSION = '3.0.3';

/**
 * Server URL used when the document is generated without a request
 */
export const DEFAULT_SERVER_URL = 'http://localhost:24817';

export const LOGO_URL =
  'https://pulp.plan.io/attachments/download/517478/pulp_logo_word_rectangle.svg';

/**
 * Component listed first in the version map
 */
export const CORE_COMPONENT = 'pulpcore';

/**
 * App label whose models get no app prefix in `*_href` parameter names
 */
export const CORE_APP_LABEL = 'core';

/**
 * Legacy management API defaults
 */
export const CLIENT_DEFAULTS = {
  HOST: 'localhost',
  PORT: 443,
  API_HANDLER: '/pulp/api',
  CERT_PATH: '/etc/pki/consumer/cert.pem',
  KEY_PATH: '/etc/pki/consumer/key.pem',
} as const;
