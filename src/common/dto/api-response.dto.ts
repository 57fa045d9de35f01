/**
 * Success envelope shared by all JSON endpoints.
 * Errors use the envelope of HttpExceptionFilter.
 */
export interface SuccessResponse<T> {
  status: "success";
  data: T;
  message?: string;
}

export interface MessageResponse {
  status: "success";
  message: string;
}

export function success<T>(data: T, message?: string): SuccessResponse<T> {
  return { status: "success", data, ...(message && { message }) };
}
