import { AppError } from '../../util/errors.js';
import type { SessionState } from './types.js';

export class InvalidBetKindError extends AppError {
  constructor(detail: string) {
    super('ERR_INVALID_BET_KIND', `Unknown bet kind: ${detail}`);
  }
}

export class InvalidBetError extends AppError {
  constructor(message: string) {
    super('ERR_INVALID_BET', message);
  }
}

export class SessionStateError extends AppError {
  readonly state: SessionState;
  constructor(action: string, state: SessionState) {
    super('ERR_SESSION_STATE', `Cannot ${action} while session is ${state}`);
    this.state = state;
  }
}
