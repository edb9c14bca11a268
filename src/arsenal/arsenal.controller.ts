import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { PlayerGuard } from '../common/guards/player.guard.js';
import { PlayerId } from '../common/decorators/player-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { unwrap } from '../types/index.js';
import { ArsenalService } from './arsenal.service.js';
import {
  ActivationContextSchema,
  TriggerBodySchema,
  type ActivationContextBody,
  type TriggerBody,
} from './dto/activation.dto.js';
import {
  AssignWeaponBodySchema,
  CombatResultBodySchema,
  ListTemplatesQuerySchema,
  ResourceAmountBodySchema,
  type AssignWeaponBody,
  type CombatResultBody,
  type ResourceAmountBody,
} from './dto/weapon.dto.js';
import { ApplyEvolutionBodySchema, type ApplyEvolutionBody } from './dto/evolution.dto.js';
import {
  CraftBodySchema,
  CraftPreviewBodySchema,
  ListComponentsQuerySchema,
  type CraftBody,
  type CraftPreviewBody,
} from './dto/craft.dto.js';

@Controller('v1/arsenal')
@UseGuards(PlayerGuard)
export class ArsenalController {
  constructor(private readonly arsenalService: ArsenalService) {}

  // --- 카탈로그 ---

  @Get('templates')
  listTemplates(@Query() rawQuery: Record<string, unknown>) {
    return this.arsenalService.listTemplates(ListTemplatesQuerySchema.parse(rawQuery));
  }

  @Post('templates')
  @HttpCode(HttpStatus.CREATED)
  registerTemplate(@Body() body: unknown) {
    return unwrap(this.arsenalService.registerTemplate(body));
  }

  @Get('components')
  listComponents(@Query() rawQuery: Record<string, unknown>) {
    return this.arsenalService.listComponents(ListComponentsQuerySchema.parse(rawQuery));
  }

  @Post('components')
  @HttpCode(HttpStatus.CREATED)
  registerComponent(@Body() body: unknown) {
    return unwrap(this.arsenalService.registerComponent(body));
  }

  // --- 무기 ---

  @Get('weapons')
  listWeapons(@PlayerId() playerId: string) {
    return this.arsenalService.listWeapons(playerId);
  }

  @Post('weapons')
  @HttpCode(HttpStatus.CREATED)
  assignWeapon(
    @PlayerId() playerId: string,
    @Body(new ZodValidationPipe(AssignWeaponBodySchema)) body: AssignWeaponBody,
  ) {
    return unwrap(this.arsenalService.assignWeapon(playerId, body.templateId));
  }

  @Get('weapons/:weaponId')
  getWeapon(@PlayerId() playerId: string, @Param('weaponId') weaponId: string) {
    return unwrap(this.arsenalService.getWeapon(playerId, weaponId));
  }

  @Delete('weapons/:weaponId')
  removeWeapon(@PlayerId() playerId: string, @Param('weaponId') weaponId: string) {
    return unwrap(this.arsenalService.removeWeapon(playerId, weaponId));
  }

  @Post('weapons/:weaponId/activation-check')
  @HttpCode(HttpStatus.OK)
  checkActivation(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(ActivationContextSchema)) body: ActivationContextBody,
  ) {
    return this.arsenalService.checkActivation(playerId, weaponId, body);
  }

  @Post('weapons/:weaponId/trigger')
  @HttpCode(HttpStatus.OK)
  trigger(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(TriggerBodySchema)) body: TriggerBody,
  ) {
    return unwrap(this.arsenalService.trigger(playerId, weaponId, body));
  }

  @Post('weapons/:weaponId/recharge')
  @HttpCode(HttpStatus.OK)
  recharge(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(ResourceAmountBodySchema)) body: ResourceAmountBody,
  ) {
    return unwrap(this.arsenalService.recharge(playerId, weaponId, body.amount));
  }

  @Post('weapons/:weaponId/repair')
  @HttpCode(HttpStatus.OK)
  repair(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(ResourceAmountBodySchema)) body: ResourceAmountBody,
  ) {
    return unwrap(this.arsenalService.repair(playerId, weaponId, body.amount));
  }

  @Post('weapons/:weaponId/combat-results')
  @HttpCode(HttpStatus.OK)
  recordCombatResult(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(CombatResultBodySchema)) body: CombatResultBody,
  ) {
    return unwrap(this.arsenalService.recordCombatResult(playerId, weaponId, body));
  }

  // --- 진화 ---

  @Get('weapons/:weaponId/evolutions')
  evolutionStatus(@PlayerId() playerId: string, @Param('weaponId') weaponId: string) {
    return unwrap(this.arsenalService.evolutionStatus(playerId, weaponId));
  }

  @Post('weapons/:weaponId/evolutions')
  @HttpCode(HttpStatus.OK)
  applyEvolution(
    @PlayerId() playerId: string,
    @Param('weaponId') weaponId: string,
    @Body(new ZodValidationPipe(ApplyEvolutionBodySchema)) body: ApplyEvolutionBody,
  ) {
    return unwrap(this.arsenalService.applyEvolution(playerId, weaponId, body.evolutionId));
  }

  @Post('weapons/:weaponId/evolutions/random')
  @HttpCode(HttpStatus.CREATED)
  generateRandomEvolution(@PlayerId() playerId: string, @Param('weaponId') weaponId: string) {
    return unwrap(this.arsenalService.generateRandomEvolution(playerId, weaponId));
  }

  // --- 제작 ---

  @Post('craft/preview')
  @HttpCode(HttpStatus.OK)
  previewCraft(@Body(new ZodValidationPipe(CraftPreviewBodySchema)) body: CraftPreviewBody) {
    return unwrap(this.arsenalService.previewCraft(body));
  }

  @Post('craft')
  @HttpCode(HttpStatus.CREATED)
  craft(@PlayerId() playerId: string, @Body(new ZodValidationPipe(CraftBodySchema)) body: CraftBody) {
    return unwrap(this.arsenalService.craft(playerId, body));
  }

  @Post('weapons/:weaponId/disassemble')
  @HttpCode(HttpStatus.OK)
  disassemble(@PlayerId() playerId: string, @Param('weaponId') weaponId: string) {
    return unwrap(this.arsenalService.disassemble(playerId, weaponId));
  }

  // --- 스냅샷 ---

  @Get('snapshot')
  exportSnapshot() {
    return this.arsenalService.exportSnapshot();
  }

  @Put('snapshot')
  importSnapshot(@Body() body: unknown) {
    return unwrap(this.arsenalService.importSnapshot(body));
  }
}
