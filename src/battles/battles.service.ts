// HTTP 전투 API: 세션을 만든 플레이어만 조회/조작할 수 있다

import { Injectable, Logger } from '@nestjs/common';
import {
  CombatStateError,
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { CombatService } from '../engine/combat/combat.service.js';
import type {
  ActionOutcome,
  CombatSession,
  CombatStatus,
} from '../engine/combat/combat-session.js';
import { err, ok, type Result } from '../types/index.js';
import type { BattleActionBody } from './dto/battle-action.dto.js';

export interface BattleActionView {
  outcome: ActionOutcome;
  status: CombatStatus;
}

@Injectable()
export class BattlesService {
  private readonly logger = new Logger(BattlesService.name);
  /** combatId → 생성한 플레이어 */
  private readonly owners = new Map<string, string>();

  constructor(private readonly combatService: CombatService) {}

  createBattle(playerId: string, body: unknown): Result<CombatStatus, InvalidInputError> {
    const created = this.combatService.createSession(body);
    if (!created.ok) return created;
    this.owners.set(created.value.id, playerId);
    this.logger.log(`Battle ${created.value.id} created by ${playerId}`);
    return ok(created.value.getStatus());
  }

  listBattles(playerId: string): CombatStatus[] {
    return this.combatService
      .listSessions()
      .filter((s) => this.owners.get(s.id) === playerId)
      .map((s) => s.getStatus());
  }

  getBattle(playerId: string, combatId: string): Result<CombatStatus, NotFoundError> {
    const session = this.findOwned(playerId, combatId);
    if (!session.ok) return session;
    return ok(session.value.getStatus());
  }

  startBattle(playerId: string, combatId: string): Result<CombatStatus, NotFoundError | CombatStateError> {
    const session = this.findOwned(playerId, combatId);
    if (!session.ok) return session;
    return session.value.start();
  }

  performAction(
    playerId: string,
    combatId: string,
    body: BattleActionBody,
  ): Result<BattleActionView, NotFoundError | CombatStateError> {
    const session = this.findOwned(playerId, combatId);
    if (!session.ok) return session;

    const { actorId, ...input } = body;
    const outcome = session.value.performAction(actorId, input);
    if (!outcome.ok) return outcome;
    return ok({ outcome: outcome.value, status: session.value.getStatus() });
  }

  nextTurn(playerId: string, combatId: string): Result<CombatStatus, NotFoundError | CombatStateError> {
    const session = this.findOwned(playerId, combatId);
    if (!session.ok) return session;
    return session.value.nextTurn();
  }

  abortBattle(playerId: string, combatId: string): Result<CombatStatus, NotFoundError | CombatStateError> {
    const session = this.findOwned(playerId, combatId);
    if (!session.ok) return session;
    return session.value.abort();
  }

  // 다른 플레이어의 전투는 존재 여부도 드러내지 않는다
  private findOwned(playerId: string, combatId: string): Result<CombatSession, NotFoundError> {
    if (this.owners.get(combatId) !== playerId) {
      return err(new NotFoundError(`Combat not found: ${combatId}`, { combatId }));
    }
    return this.combatService.getSession(combatId);
  }
}
