import { JwtService } from '@nestjs/jwt';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { PlayerGuard, getResolvedPlayerId } from './player.guard.js';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { UnauthorizedError } from '../errors/game-errors.js';

describe('PlayerGuard', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });

  function guardWith(allowHeaderIdentity: boolean): PlayerGuard {
    return new PlayerGuard(jwtService, new ArsenalConfigService({ allowHeaderIdentity }));
  }

  function contextFor(req: object): ExecutionContextHost {
    return new ExecutionContextHost([req, {}, () => undefined]);
  }

  it('Bearer 토큰의 sub 를 플레이어 id 로', () => {
    const req = { headers: { authorization: `Bearer ${jwtService.sign({ sub: 'player_1' })}` } };

    expect(guardWith(false).canActivate(contextFor(req))).toBe(true);
    expect(getResolvedPlayerId(req)).toBe('player_1');
  });

  it('다른 secret 으로 서명된 토큰 거절', () => {
    const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 'player_1' });
    const req = { headers: { authorization: `Bearer ${forged}` } };

    expect(() => guardWith(true).canActivate(contextFor(req))).toThrow('Invalid or expired token');
    expect(getResolvedPlayerId(req)).toBeUndefined();
  });

  it('sub 가 없는 토큰 거절', () => {
    const req = { headers: { authorization: `Bearer ${jwtService.sign({ role: 'admin' })}` } };
    expect(() => guardWith(true).canActivate(contextFor(req))).toThrow('Token has no valid subject');
  });

  it('헤더 신원: 허용 시에만', () => {
    const req = { headers: { 'x-player-id': 'player_2' } };

    expect(guardWith(true).canActivate(contextFor(req))).toBe(true);
    expect(getResolvedPlayerId(req)).toBe('player_2');
    expect(() => guardWith(false).canActivate(contextFor({ headers: { 'x-player-id': 'player_2' } }))).toThrow(
      UnauthorizedError,
    );
  });

  it('형식이 잘못된 헤더 id 거절', () => {
    const req = { headers: { 'x-player-id': 'bad id with spaces' } };
    expect(() => guardWith(true).canActivate(contextFor(req))).toThrow(
      'Bearer token or x-player-id header is required',
    );
  });
});
