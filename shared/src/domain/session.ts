// Login state for one interactive session; passed around explicitly, never kept in a global.
export type Session = {
  authenticated: boolean;
};

export const anonymousSession: Session = { authenticated: false };

export function authenticatedSession(): Session {
  return { authenticated: true };
}
