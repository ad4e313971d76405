import 'express';

declare global {
  namespace Express {
    /** Authenticated caller populated by the Firebase auth middleware */
    interface AuthenticatedUser {
      uid: string;
      email?: string;
      /** Recorded as createdBy/updatedBy on quotes */
      username: string;
      groups: string[];
      isAdmin: boolean;
    }

    interface Request {
      /** Request id assigned by the request logger */
      id?: string;

      /** Set by Firebase auth middleware when token is valid */
      user?: AuthenticatedUser;
    }
  }
}

export {}; // ensure this file is treated as a module
