export interface IBaseApiConfig {
  /**
   * app is global configuration for the app. These values are the same in every environment.
   */
  app: {
    name: string;
  },
  /**
   * Absent when DATABASE_URL or DATABASE_NAME is missing. The API still starts, but every
   * store-dependent endpoint answers with a StoreUnavailableError.
   */
  database?: {
    url: string;
    name: string;
  },
  debug?: {
    showErrors?: boolean;
  },
  env: string;
  migrations: {
    runOnStartup: boolean;
  },
  network: {
    corsAllowedOrigins: string[];
    externalPort: number;
    hostName: string;
  }
}
