// HTTP STATUS CODES //

/** HTTP 200 OK status code, the only success status of the token endpoint */
export const HTTP_STATUS_OK = 200;
/** HTTP 204 No Content status code returned by deletions */
export const HTTP_STATUS_NO_CONTENT = 204;
/** lowest status code classified as an api error */
export const HTTP_STATUS_BAD_REQUEST = 400;
/** HTTP 401 Unauthorized status code for authentication errors */
export const HTTP_STATUS_UNAUTHORIZED = 401;

// CONTENT TYPES //

/** content type of json request bodies */
export const CONTENT_TYPE_JSON = 'application/json';
/** content type of form-encoded request bodies */
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';
