import path from 'path';

export interface Config {
  server: {
    port: number;
    host: string;
  };
  ledger: {
    dataFile: string;
    exportDir: string;
  };
  logging: {
    level: string;
  };
}

/**
 * Build the configuration once at startup and hand it to whoever needs it
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '0.0.0.0',
    },
    ledger: {
      dataFile: path.resolve(env.FINANCE_DATA_FILE || 'data/finance_data.csv'),
      exportDir: path.resolve(env.LEDGER_EXPORT_DIR || 'data/exports'),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
  };
}
