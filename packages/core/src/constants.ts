/**
 * Fixed values shared across the transfer pipeline.
 *
 * @module constants
 */

/** Product name reported to remote servers */
export const PRODUCT_NAME = 'supervised-fetch';

/** Product version reported to remote servers */
export const PRODUCT_VERSION = '0.1.0';

/** User agent passed to curl so requests through URL shorteners can be traced */
export const USER_AGENT = `${PRODUCT_NAME}/${PRODUCT_VERSION}`;

/** Default transfer tool binary */
export const DEFAULT_CURL_BINARY = 'curl';

/** Maximum number of redirects curl will follow */
export const MAX_REDIRECTS = 10;

/** Environment variable curl reads for its CA bundle */
export const CA_BUNDLE_ENV_VAR = 'CURL_CA_BUNDLE';

/** File name of the CA bundle shipped inside a packaged install */
export const EMBEDDED_CA_BUNDLE_FILE = 'cacert.pem';

/** Grace period between SIGTERM and SIGKILL on cancellation: 5 seconds */
export const DEFAULT_KILL_GRACE_MS = 5_000;
