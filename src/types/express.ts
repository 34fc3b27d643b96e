import { Principal } from './auth';

declare global {
  namespace Express {
    interface Request {
      /** Set by the authenticate middleware */
      user?: Principal;
      requestId?: string;
    }
  }
}

export {};
