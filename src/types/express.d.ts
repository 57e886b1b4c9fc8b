declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware once the caller is verified */
      userId?: string;
    }
  }
}

export {};
