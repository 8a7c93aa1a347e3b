export type DatabaseConfig = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  name?: string;
  synchronize: boolean;
  // Upper bound of the pg pool; requests beyond it wait for a free connection.
  maxConnections: number;
  // How long a request may wait for a pooled connection before failing.
  connectionTimeoutMs: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
  logging: boolean | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
