/** HTTP 200 OK status code */
export const HTTP_OK = 200;
/**
 * HTTP 201 Created status code
 * @description returned when a proxy client has been registered.
 */
export const HTTP_CREATED = 201;
/**
 * HTTP 302 Found status code
 * @description used to send the user agent on to the provider's authorization endpoint.
 */
export const HTTP_FOUND = 302;
/**
 * HTTP 400 Bad Request status code
 * @description the request is malformed or carries invalid oauth parameters.
 */
export const HTTP_BAD_REQUEST = 400;
/**
 * HTTP 401 Unauthorized status code
 * @description authentication is required and has failed or has not been provided.
 */
export const HTTP_UNAUTHORIZED = 401;
/** HTTP 404 Not Found status code */
export const HTTP_NOT_FOUND = 404;
/**
 * HTTP 429 Too Many Requests status code
 * @description the caller has failed too often within the rate-limit window.
 */
export const HTTP_TOO_MANY_REQUESTS = 429;
/** HTTP 500 Internal Server Error status code */
export const HTTP_INTERNAL_SERVER_ERROR = 500;
/**
 * HTTP 502 Bad Gateway status code
 * @description the provider could not be reached.
 */
export const HTTP_BAD_GATEWAY = 502;
/**
 * HTTP 504 Gateway Timeout status code
 * @description the provider did not answer within the upstream timeout.
 */
export const HTTP_GATEWAY_TIMEOUT = 504;
