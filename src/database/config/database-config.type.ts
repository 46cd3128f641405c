export type DatabaseConfig = {
  url?: string;
  type?: string;
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize?: boolean;
  maxConnections: number;
  sslEnabled?: boolean;
  rejectUnauthorized?: boolean;
  ca?: string;
  key?: string;
  cert?: string;
  // false = no logging, true = all logging, array = specific log types
  logging?:
    | boolean
    | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
