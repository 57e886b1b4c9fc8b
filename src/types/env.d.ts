declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: 'development' | 'production' | 'test';
    PORT?: string;
    DATABASE_URL?: string;
    DATABASE_SCHEMA_PATH?: string;
    FRONTEND_URL?: string;
    LOG_QUERIES?: string;
    CLERK_SECRET_KEY?: string;
  }
}
