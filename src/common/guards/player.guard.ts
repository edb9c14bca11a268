import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { ArsenalConfigService } from '../../config/arsenal-config.service.js';
import { UnauthorizedError } from '../errors/game-errors.js';

export const PLAYER_ID_HEADER = 'x-player-id';

const PLAYER_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,64}$/;

/** 가드가 확인한 요청별 플레이어 id */
const resolvedPlayers = new WeakMap<object, string>();

export function getResolvedPlayerId(req: object): string | undefined {
  return resolvedPlayers.get(req);
}

@Injectable()
export class PlayerGuard implements CanActivate {
  constructor(
    private readonly jwtService: JwtService,
    private readonly config: ArsenalConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();

    // 1. Bearer token: sub 가 플레이어 id
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const playerId = this.verifyToken(authHeader.slice(7));
      resolvedPlayers.set(req, playerId);
      return true;
    }

    // 2. x-player-id 헤더 (allowHeaderIdentity 일 때만)
    if (this.config.get().allowHeaderIdentity) {
      const raw = req.headers[PLAYER_ID_HEADER];
      if (typeof raw === 'string' && PLAYER_ID_PATTERN.test(raw)) {
        resolvedPlayers.set(req, raw);
        return true;
      }
    }

    throw new UnauthorizedError(`Bearer token or ${PLAYER_ID_HEADER} header is required`);
  }

  private verifyToken(token: string): string {
    let payload: { sub?: unknown };
    try {
      payload = this.jwtService.verify<{ sub?: unknown }>(token);
    } catch {
      throw new UnauthorizedError('Invalid or expired token');
    }
    if (typeof payload.sub !== 'string' || !PLAYER_ID_PATTERN.test(payload.sub)) {
      throw new UnauthorizedError('Token has no valid subject');
    }
    return payload.sub;
  }
}
