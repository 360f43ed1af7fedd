export { ApiErrorResponse, ApiResponse, ok, unwrap } from './api-response';
