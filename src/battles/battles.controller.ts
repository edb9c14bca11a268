import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { PlayerGuard } from '../common/guards/player.guard.js';
import { PlayerId } from '../common/decorators/player-id.decorator.js';
import { unwrap } from '../types/index.js';
import { BattlesService } from './battles.service.js';
import { BattleActionBodySchema } from './dto/battle-action.dto.js';

@Controller('v1/battles')
@UseGuards(PlayerGuard)
export class BattlesController {
  constructor(private readonly battlesService: BattlesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createBattle(@PlayerId() playerId: string, @Body() body: unknown) {
    return unwrap(this.battlesService.createBattle(playerId, body));
  }

  @Get()
  listBattles(@PlayerId() playerId: string) {
    return this.battlesService.listBattles(playerId);
  }

  @Get(':combatId')
  getBattle(@PlayerId() playerId: string, @Param('combatId') combatId: string) {
    return unwrap(this.battlesService.getBattle(playerId, combatId));
  }

  @Post(':combatId/start')
  @HttpCode(HttpStatus.OK)
  startBattle(@PlayerId() playerId: string, @Param('combatId') combatId: string) {
    return unwrap(this.battlesService.startBattle(playerId, combatId));
  }

  @Post(':combatId/actions')
  @HttpCode(HttpStatus.OK)
  performAction(
    @PlayerId() playerId: string,
    @Param('combatId') combatId: string,
    @Body() body: Record<string, unknown>,
  ) {
    const action = BattleActionBodySchema.parse(body);
    return unwrap(this.battlesService.performAction(playerId, combatId, action));
  }

  @Post(':combatId/next-turn')
  @HttpCode(HttpStatus.OK)
  nextTurn(@PlayerId() playerId: string, @Param('combatId') combatId: string) {
    return unwrap(this.battlesService.nextTurn(playerId, combatId));
  }

  @Post(':combatId/abort')
  @HttpCode(HttpStatus.OK)
  abortBattle(@PlayerId() playerId: string, @Param('combatId') combatId: string) {
    return unwrap(this.battlesService.abortBattle(playerId, combatId));
  }
}
