import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/game-errors.js';
import { getResolvedPlayerId } from '../guards/player.guard.js';

export const PlayerId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    const playerId = getResolvedPlayerId(req);
    if (playerId === undefined) throw new UnauthorizedError('Player identity was not resolved');
    return playerId;
  },
);
