import dotenv from 'dotenv';
dotenv.config();

export const config = {
  sql: {
    host: process.env.DROPPER_SQL_HOST || 'localhost',
    port: parseInt(process.env.DROPPER_SQL_PORT || '1433', 10),
    database: process.env.DROPPER_SQL_DATABASE || 'master',
    user: process.env.DROPPER_SQL_USER || '',
    password: process.env.DROPPER_SQL_PASSWORD || '',
    options: {
      encrypt: process.env.DROPPER_SQL_ENCRYPT === 'true',
      trustServerCertificate: process.env.DROPPER_SQL_TRUST_SERVER_CERT === 'true',
    },
    // Every statement is forwarded through this linked server
    linkedServer: process.env.DROPPER_LINKED_SERVER || 'DATABRICKS',
    requestTimeoutMs: parseInt(process.env.DROPPER_REQUEST_TIMEOUT_MS || '120000', 10),
    connectionTimeoutMs: 30000,
  },
  defaults: {
    namespace: process.env.DROPPER_DEFAULT_NAMESPACE || 'main.default',
    mode: 'preview',
  },
} as const;
