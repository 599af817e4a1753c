export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  timestamp?: string;
  path?: string;
  context?: {
    account: string;
    symbol: string;
    date?: string;
    index?: number;
  };
}
