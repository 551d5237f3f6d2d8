export { fetchWithTimeout, parseRetryAfter, throwForStatus, l2Normalize } from './http.js'
