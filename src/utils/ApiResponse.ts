/** Success envelope: `{ success: true, message, data }`. Errors go through the error middleware. */
export interface ApiResponse<T> {
  success: true;
  message: string;
  data: T;
}

export const ApiResponse = {
  success<T>(message: string, data: T): ApiResponse<T> {
    return { success: true, message, data };
  },
};
