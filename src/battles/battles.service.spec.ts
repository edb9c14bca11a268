import { BattlesService } from './battles.service.js';
import { ArsenalConfigService } from '../config/arsenal-config.service.js';
import { CombatService } from '../engine/combat/combat.service.js';
import { DamageService } from '../engine/combat/damage.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { UtilityService } from '../engine/effects/utility.service.js';
import { EffectResolverService } from '../engine/effects/effect-resolver.service.js';
import { WeaponCatalogService } from '../engine/arsenal/weapon-catalog.service.js';
import { WeaponRegistryService } from '../engine/arsenal/weapon-registry.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';

const DUEL = {
  seed: 'duel',
  participants: [
    { id: 'player_1', name: 'Vex', side: 'PLAYER', health: 100, maxHealth: 100, attack: 12 },
    { id: 'drone_1', name: 'Drone', side: 'ENEMY', health: 50, maxHealth: 50, attack: 8 },
  ],
};

describe('BattlesService', () => {
  let service: BattlesService;

  beforeEach(() => {
    const config = new ArsenalConfigService({ combatLogTail: 5, seed: 'test-seed' });
    const catalog = new WeaponCatalogService();
    const progression = new ProgressionService(config);
    const registry = new WeaponRegistryService(catalog, progression);
    const status = new StatusService();
    const damage = new DamageService();
    const combat = new CombatService(
      config,
      new RngService(),
      registry,
      progression,
      new EffectResolverService(damage, status, new UtilityService(status)),
      damage,
      status,
    );
    service = new BattlesService(combat);
  });

  function create(): string {
    const created = service.createBattle('player_1', DUEL);
    if (!created.ok) throw created.error;
    return created.value.id;
  }

  it('생성 → PREPARATION 상태', () => {
    const created = service.createBattle('player_1', DUEL);

    expect(created.ok && created.value.phase).toBe('PREPARATION');
    expect(created.ok && created.value.currentActorId).toBeUndefined();
    expect(service.listBattles('player_1')).toHaveLength(1);
  });

  it('참가자 검증 실패 → INVALID_INPUT', () => {
    const created = service.createBattle('player_1', { participants: [DUEL.participants[0]] });
    expect(!created.ok && created.error.code).toBe('INVALID_INPUT');
  });

  it('다른 플레이어의 전투는 NOT_FOUND', () => {
    const id = create();

    const result = service.getBattle('player_2', id);
    expect(!result.ok && result.error.message).toBe(`Combat not found: ${id}`);
    expect(service.listBattles('player_2')).toEqual([]);
  });

  it('시작 → 행동 → 다음 행동자', () => {
    const id = create();
    const started = service.startBattle('player_1', id);
    if (!started.ok) throw started.error;
    expect(started.value.phase).toBe('IN_PROGRESS');

    const first = started.value.currentActorId;
    const second = first === 'player_1' ? 'drone_1' : 'player_1';
    if (first === undefined) throw new Error('no current actor');

    const acted = service.performAction('player_1', id, { actorId: first, kind: 'DEFEND' });
    if (!acted.ok) throw acted.error;
    expect(acted.value.outcome).toMatchObject({ success: true, action: 'DEFEND', actorId: first });
    expect(acted.value.status.currentActorId).toBe(second);
  });

  it('차례가 아닌 행동자 공격 → COMBAT_STATE', () => {
    const id = create();
    const started = service.startBattle('player_1', id);
    if (!started.ok) throw started.error;
    const waiting = started.value.currentActorId === 'player_1' ? 'drone_1' : 'player_1';

    const acted = service.performAction('player_1', id, { actorId: waiting, kind: 'ATTACK' });
    expect(!acted.ok && acted.error.code).toBe('COMBAT_STATE');
  });

  it('중단 후 재중단 → COMBAT_STATE', () => {
    const id = create();
    service.startBattle('player_1', id);

    const aborted = service.abortBattle('player_1', id);
    expect(aborted.ok && aborted.value.phase).toBe('ABORTED');

    const again = service.abortBattle('player_1', id);
    expect(!again.ok && again.error.code).toBe('COMBAT_STATE');
    const next = service.nextTurn('player_1', id);
    expect(!next.ok && next.error.code).toBe('COMBAT_STATE');
  });
});
