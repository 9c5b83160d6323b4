export interface ServiceStatusResponse {
  status: "online";
  service: string;
  version: string;
  endpoints: Record<string, string>;
}

export interface HealthResponse {
  status: "healthy";
}

export interface ErrorResponse {
  error: string;
}
