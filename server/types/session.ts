import type { Session, SessionData } from 'express-session';

export interface SessionUser {
  id: number;
  email: string;
  name: string;
}

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
  }
}

export function getSessionUser(req: { session?: Session & Partial<SessionData> }): SessionUser | undefined {
  return req.session?.user;
}
