// 오류 분류: VALIDATION / RESOURCE / STATE 는 호출자가 복구 가능, INTERNAL 만 500

import { HttpStatus } from '@nestjs/common';

export type ErrorCategory = 'VALIDATION' | 'RESOURCE' | 'STATE' | 'AUTH' | 'INTERNAL';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly category: ErrorCategory = 'INTERNAL',
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class MissingFieldError extends GameError {
  constructor(
    public readonly field: string,
    message = `Missing required field: ${field}`,
  ) {
    super('MISSING_FIELD', message, HttpStatus.BAD_REQUEST, { field }, 'VALIDATION');
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details, 'VALIDATION');
  }
}

export class DuplicateIdError extends GameError {
  constructor(kind: string, id: string) {
    super('DUPLICATE_ID', `${kind} already registered: ${id}`, HttpStatus.CONFLICT, { kind, id }, 'VALIDATION');
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details, 'VALIDATION');
  }
}

export class AlreadyAssignedError extends GameError {
  constructor(playerId: string, weaponId: string) {
    super(
      'ALREADY_ASSIGNED',
      `Weapon ${weaponId} is already assigned to ${playerId}`,
      HttpStatus.CONFLICT,
      { playerId, weaponId },
      'STATE',
    );
  }
}

export type ResourceKind = 'CHARGE' | 'DURABILITY' | 'COOLDOWN';

export class InsufficientResourceError extends GameError {
  constructor(
    public readonly resource: ResourceKind,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      'INSUFFICIENT_RESOURCE',
      `Insufficient ${resource.toLowerCase()}: need ${required}, have ${available}`,
      HttpStatus.CONFLICT,
      { resource, required, available, shortfall: required - available },
      'RESOURCE',
    );
  }
}

export class NotEligibleError extends GameError {
  constructor(message = 'Not eligible', details?: Record<string, unknown>) {
    super('NOT_ELIGIBLE', message, HttpStatus.CONFLICT, details, 'STATE');
  }
}

export type CraftErrorReason =
  | 'MISSING_REQUIRED_COMPONENT'
  | 'UNKNOWN_COMPONENT'
  | 'NO_COMPATIBLE_CATEGORY'
  | 'INCOMPATIBLE_COMPONENT'
  | 'NOT_CRAFTED';

export class CraftError extends GameError {
  constructor(
    public readonly reason: CraftErrorReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('CRAFT_ERROR', message, 422, { reason, ...details }, 'VALIDATION');
  }
}

export type CombatStateReason =
  | 'NOT_YOUR_TURN'
  | 'COMBAT_NOT_ACTIVE'
  | 'INVALID_PHASE'
  | 'UNKNOWN_PARTICIPANT'
  | 'INVALID_TARGET';

export class CombatStateError extends GameError {
  constructor(
    public readonly reason: CombatStateReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('COMBAT_STATE', message, HttpStatus.CONFLICT, { reason, ...details }, 'STATE');
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details, 'AUTH');
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details, 'INTERNAL');
  }
}
