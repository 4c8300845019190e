import type { Credentials } from '../config/credentials.js';
import type {
  Action,
  CredentialField,
  PageStateSnapshot,
  StepPhase,
  StepRecord,
  TypeAction,
} from '../schema/index.js';
import { hasPasswordInput, isPasswordInput } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { matchElement } from './resolver.js';

// ── Placeholders ─────────────────────────────────────────────
// The oracle only ever sees these tokens; real values are swapped in
// after the decision, right before execution.

export const CREDENTIAL_PLACEHOLDERS = {
  username: '{{username}}',
  password: '{{password}}',
} as const satisfies Record<CredentialField, string>;

const PASSWORD_PATTERN = /pass(word|code|phrase)?|pwd|\bpin\b/i;
const USERNAME_PATTERN = /user(name)?|e-?mail|login|account|\bid\b|phone/i;

export function containsPlaceholder(value: string): boolean {
  return (
    value.includes(CREDENTIAL_PLACEHOLDERS.username) ||
    value.includes(CREDENTIAL_PLACEHOLDERS.password)
  );
}

export function substitutePlaceholders(value: string, credentials: Credentials): string {
  return value
    .split(CREDENTIAL_PLACEHOLDERS.username).join(credentials.username)
    .split(CREDENTIAL_PLACEHOLDERS.password).join(credentials.password);
}

/**
 * Which credential a Type target asks for, if any. Uses the
 * resolver's fallback matching to find the field, then its input
 * type and label keywords.
 */
export function credentialFieldFor(
  targetText: string,
  snapshot: PageStateSnapshot,
): CredentialField | undefined {
  const match = matchElement(targetText, snapshot.interactiveElements);
  if (match && isPasswordInput(match.element)) return 'password';

  const text = [targetText, match?.element.accessibleText, match?.element.identifierHint]
    .filter(Boolean)
    .join(' ');

  if (PASSWORD_PATTERN.test(text)) return 'password';
  if (USERNAME_PATTERN.test(text)) return 'username';
  return undefined;
}

// ── Login handler ────────────────────────────────────────────

export type PreparedAction =
  | {
      ok: true;
      /** Sent to the browser; may carry real credential values. */
      executable: Action;
      /** Written to the trace and history; placeholders only. */
      recorded: Action;
      injected?: CredentialField | undefined;
    }
  | { ok: false; recorded: Action; message: string };

/**
 * Owns the login sub-protocol state and the credential seam.
 * A password field appearing where none existed switches the run
 * into login handling; the next matching Type gets the credential.
 */
export class LoginHandler {
  private currentPhase: StepPhase = 'running';
  private readonly credentials: Credentials | undefined;

  constructor(credentials?: Credentials) {
    this.credentials = credentials;
  }

  get phase(): StepPhase {
    return this.currentPhase;
  }

  get credentialsAvailable(): boolean {
    return this.credentials !== undefined;
  }

  /**
   * Inspect a finished step. Login handling starts when a password
   * field appears and ends once the password has actually been filled.
   */
  observe(record: StepRecord): boolean {
    if (this.currentPhase === 'login') {
      if (record.credentialInjected === 'password' && record.success) {
        this.currentPhase = 'running';
        log.login('Password supplied; leaving login handling');
      }
      return false;
    }
    if (!this.credentials) return false;

    const passwordAppeared = record.elementsAppeared.some(isPasswordInput);
    if (!passwordAppeared || hasPasswordInput(record.stateBefore)) return false;

    this.currentPhase = 'login';
    log.login('Password field appeared; credentials will be supplied to the next matching field');
    return true;
  }

  prepare(action: Action, snapshot: PageStateSnapshot): PreparedAction {
    if (action.kind !== 'type') {
      return { ok: true, executable: action, recorded: action };
    }

    if (this.currentPhase === 'login' && this.credentials) {
      const field = credentialFieldFor(action.targetText, snapshot);
      if (field) {
        log.login(`Supplying ${field}`);
        return {
          ok: true,
          executable: { ...action, value: this.credentials[field] },
          recorded: { ...action, value: CREDENTIAL_PLACEHOLDERS[field] },
          injected: field,
        };
      }
    }

    if (!containsPlaceholder(action.value)) {
      return { ok: true, executable: action, recorded: action };
    }

    if (!this.credentials) {
      return {
        ok: false,
        recorded: action,
        message: 'Action uses a credential placeholder but no credentials were supplied',
      };
    }

    return {
      ok: true,
      executable: { ...action, value: substitutePlaceholders(action.value, this.credentials) },
      recorded: action,
      injected: placeholderField(action),
    };
  }
}

function placeholderField(action: TypeAction): CredentialField {
  return action.value.includes(CREDENTIAL_PLACEHOLDERS.password) ? 'password' : 'username';
}
