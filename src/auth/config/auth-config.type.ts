export type AuthConfig = {
  // Bearer key for service-to-service callers of the extraction API
  serviceApiKey?: string;
};
