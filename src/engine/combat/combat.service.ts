// 전투 세션 관리: 세션마다 고유 RNG 스트림 (seed 지정 시 재현 가능)

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { InvalidInputError, NotFoundError } from '../../common/errors/game-errors.js';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import { RngService } from '../rng/rng.service.js';
import { WeaponRegistryService } from '../arsenal/weapon-registry.service.js';
import { ProgressionService } from '../progression/progression.service.js';
import { EffectResolverService } from '../effects/effect-resolver.service.js';
import { StatusService } from '../status/status.service.js';
import { DamageService } from './damage.service.js';
import { CombatSession } from './combat-session.js';
import { CombatantSchema, err, ok, type Result } from '../../types/index.js';

export const CreateCombatSchema = z.object({
  participants: z.array(CombatantSchema).min(2),
  seed: z.string().min(1).max(120).optional(),
});
export type CreateCombatInput = z.input<typeof CreateCombatSchema>;

@Injectable()
export class CombatService {
  private readonly logger = new Logger(CombatService.name);
  private readonly sessions = new Map<string, CombatSession>();
  private sessionSeq = 0;

  constructor(
    private readonly config: ArsenalConfigService,
    private readonly rngService: RngService,
    private readonly registry: WeaponRegistryService,
    private readonly progression: ProgressionService,
    private readonly resolver: EffectResolverService,
    private readonly damage: DamageService,
    private readonly status: StatusService,
  ) {}

  /** 참가자 검증 후 PREPARATION 상태의 세션 생성 */
  createSession(input: unknown): Result<CombatSession, InvalidInputError> {
    const parsed = CreateCombatSchema.safeParse(input);
    if (!parsed.success) {
      return err(new InvalidInputError('Invalid combat setup', { issues: formatZodIssues(parsed.error) }));
    }
    const { participants, seed } = parsed.data;

    const ids = new Set<string>();
    for (const p of participants) {
      if (ids.has(p.id)) return err(new InvalidInputError(`Duplicate participant: ${p.id}`, { id: p.id }));
      ids.add(p.id);
    }
    if (!participants.some((p) => p.side === 'PLAYER') || !participants.some((p) => p.side === 'ENEMY')) {
      return err(new InvalidInputError('Combat needs at least one player and one enemy'));
    }
    for (const p of participants) {
      if (p.equippedWeaponId && !this.registry.getInstance(p.id, p.equippedWeaponId)) {
        return err(
          new InvalidInputError(`${p.id} does not own weapon ${p.equippedWeaponId}`, {
            participantId: p.id,
            weaponId: p.equippedWeaponId,
          }),
        );
      }
    }

    const id = `combat_${++this.sessionSeq}`;
    const { seed: baseSeed, combatLogTail } = this.config.get();
    const rng = this.rngService.create(seed ?? `${baseSeed}:${id}`);
    const session = new CombatSession(
      id,
      participants,
      rng,
      {
        registry: this.registry,
        progression: this.progression,
        resolver: this.resolver,
        damage: this.damage,
        status: this.status,
      },
      combatLogTail,
    );
    this.sessions.set(id, session);
    this.logger.log(`Combat session created: ${id} (${participants.length} participants)`);
    return ok(session);
  }

  getSession(id: string): Result<CombatSession, NotFoundError> {
    const session = this.sessions.get(id);
    if (!session) return err(new NotFoundError(`Combat not found: ${id}`, { combatId: id }));
    return ok(session);
  }

  listSessions(): CombatSession[] {
    return [...this.sessions.values()];
  }

  removeSession(id: string): boolean {
    return this.sessions.delete(id);
  }
}
