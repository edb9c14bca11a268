// 제작 부품 카탈로그

import { Injectable, Logger } from '@nestjs/common';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import {
  DuplicateIdError,
  InvalidInputError,
  MissingFieldError,
} from '../../common/errors/game-errors.js';
import {
  ComponentSchema,
  err,
  ok,
  type Component,
  type ComponentCategory,
  type Result,
} from '../../types/index.js';

const REQUIRED_FIELDS = ['id', 'name', 'category', 'rarity', 'craftingDifficulty'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class ComponentCatalogService {
  private readonly logger = new Logger(ComponentCatalogService.name);
  private readonly components = new Map<string, Component>();

  registerComponent(
    input: unknown,
  ): Result<Component, MissingFieldError | DuplicateIdError | InvalidInputError> {
    if (!isRecord(input)) return err(new InvalidInputError('Component must be an object'));
    const record = input;
    const missing = REQUIRED_FIELDS.find((f) => record[f] === undefined || record[f] === null);
    if (missing) return err(new MissingFieldError(missing));

    const parsed = ComponentSchema.safeParse(input);
    if (!parsed.success) {
      return err(new InvalidInputError('Invalid component', { issues: formatZodIssues(parsed.error) }));
    }
    if (this.components.has(parsed.data.id)) {
      this.logger.warn(`Duplicate component rejected: ${parsed.data.id}`);
      return err(new DuplicateIdError('Component', parsed.data.id));
    }

    this.components.set(parsed.data.id, parsed.data);
    this.logger.log(`Component registered: ${parsed.data.id} (${parsed.data.category})`);
    return ok(parsed.data);
  }

  getComponent(id: string): Component | undefined {
    return this.components.get(id);
  }

  listComponents(category?: ComponentCategory): Component[] {
    const all = [...this.components.values()];
    return category ? all.filter((c) => c.category === category) : all;
  }

  replaceAll(components: Component[]): void {
    this.components.clear();
    for (const c of components) this.components.set(c.id, c);
  }
}
