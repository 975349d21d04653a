/**
 * Session state machine.
 *
 * A session is a plain value owned by whoever serves the visitor (a socket
 * connection, the CLI monitor, a single HTTP request). User actions arrive as
 * events and are folded in with `transition`; a `render` event validates the
 * held token and derives the status message for that cycle.
 */

export type SessionStatus = 'unauthenticated' | 'pending' | 'authenticated' | 'rejected';

export interface Session {
  status: SessionStatus;
  token: string | null;
  authenticated: boolean;
  /** One-shot: set by tokenSubmitted, cleared by the next render. */
  lastActionWasAuthAttempt: boolean;
}

export type SessionEvent =
  | { type: 'tokenSubmitted'; token: string }
  | { type: 'render' };

export type UserAction = Extract<SessionEvent, { type: 'tokenSubmitted' }>;

export type StatusMessage =
  | { level: 'success'; text: 'Successfully Authenticated'; celebrate: true }
  | { level: 'error'; text: 'Invalid Token' }
  | { level: 'warning'; text: 'Please Authenticate' };

export interface TransitionResult {
  session: Session;
  message: StatusMessage | null;
}

export type TokenVerifier = (token: string) => boolean;

export const MESSAGES = {
  authenticated: { level: 'success', text: 'Successfully Authenticated', celebrate: true },
  invalidToken: { level: 'error', text: 'Invalid Token' },
  pleaseAuthenticate: { level: 'warning', text: 'Please Authenticate' },
} as const satisfies Record<string, StatusMessage>;

export function createSession(): Session {
  return {
    status: 'unauthenticated',
    token: null,
    authenticated: false,
    lastActionWasAuthAttempt: false,
  };
}

function deriveMessage(status: SessionStatus, attempt: boolean): StatusMessage | null {
  switch (status) {
    case 'authenticated':
      return attempt ? MESSAGES.authenticated : null;
    case 'rejected':
      // Without an attempt this is a held token that expired between cycles
      return attempt ? MESSAGES.invalidToken : MESSAGES.pleaseAuthenticate;
    case 'unauthenticated':
    case 'pending':
      return MESSAGES.pleaseAuthenticate;
  }
}

export function transition(session: Session, event: SessionEvent, verify: TokenVerifier): TransitionResult {
  if (event.type === 'tokenSubmitted') {
    return {
      session: {
        status: 'pending',
        token: event.token,
        authenticated: false,
        lastActionWasAuthAttempt: true,
      },
      message: null,
    };
  }

  let next: Session;
  if (session.token === null) {
    next = { status: 'unauthenticated', token: null, authenticated: false, lastActionWasAuthAttempt: false };
  } else if (verify(session.token)) {
    next = { status: 'authenticated', token: session.token, authenticated: true, lastActionWasAuthAttempt: false };
  } else {
    next = { status: 'rejected', token: null, authenticated: false, lastActionWasAuthAttempt: false };
  }

  return {
    session: next,
    message: deriveMessage(next.status, session.lastActionWasAuthAttempt),
  };
}

/** Folds user actions, then runs the render transition for this cycle. */
export function advanceSession(
  session: Session,
  actions: readonly UserAction[],
  verify: TokenVerifier,
): TransitionResult {
  let current = session;
  for (const action of actions) {
    current = transition(current, action, verify).session;
  }
  return transition(current, { type: 'render' }, verify);
}
