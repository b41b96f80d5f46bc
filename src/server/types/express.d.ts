export interface AuthenticatedUser {
  /** Owner identity that scopes every data access */
  userId: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}
