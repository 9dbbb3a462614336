import { SignJWT, jwtVerify } from 'jose';
import { authenticatedSession, type Session } from '@procmon/shared';

import { getSessionSecret } from '../config.js';

const SESSION_SUBJECT = 'engineering';

export async function signSessionToken(): Promise<string> {
  return await new SignJWT({ scope: SESSION_SUBJECT })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(SESSION_SUBJECT)
    .setIssuedAt()
    .setExpirationTime('12h')
    .sign(getSessionSecret());
}

export async function verifySessionToken(token: string): Promise<Session> {
  const { payload } = await jwtVerify(token, getSessionSecret(), { algorithms: ['HS256'] });
  if (payload.sub !== SESSION_SUBJECT) throw new Error('Invalid token payload');
  return authenticatedSession();
}
