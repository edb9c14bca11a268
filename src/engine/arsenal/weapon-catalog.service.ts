// 무기 템플릿 카탈로그: 등록 후 불변, 인스턴스는 사본을 가진다

import { Injectable, Logger } from '@nestjs/common';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import {
  DuplicateIdError,
  InvalidInputError,
  MissingFieldError,
} from '../../common/errors/game-errors.js';
import {
  RARITY_VALUE,
  WeaponTemplateSchema,
  err,
  ok,
  type Rarity,
  type Result,
  type WeaponCategory,
  type WeaponTemplate,
} from '../../types/index.js';

const REQUIRED_FIELDS = ['id', 'name', 'description', 'category', 'rarity', 'effects'] as const;

export interface TemplateFilter {
  category?: WeaponCategory;
  minRarity?: Rarity;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class WeaponCatalogService {
  private readonly logger = new Logger(WeaponCatalogService.name);
  private readonly templates = new Map<string, WeaponTemplate>();

  registerTemplate(
    input: unknown,
  ): Result<WeaponTemplate, MissingFieldError | DuplicateIdError | InvalidInputError> {
    if (!isRecord(input)) return err(new InvalidInputError('Template must be an object'));

    for (const field of REQUIRED_FIELDS) {
      if (input[field] === undefined || input[field] === null) {
        return err(new MissingFieldError(field));
      }
    }
    const stats = input.stats;
    if (!isRecord(stats) || stats.baseDamage === undefined || stats.baseDamage === null) {
      return err(new MissingFieldError('stats.baseDamage'));
    }

    const parsed = WeaponTemplateSchema.safeParse(input);
    if (!parsed.success) {
      return err(
        new InvalidInputError('Invalid weapon template', { issues: formatZodIssues(parsed.error) }),
      );
    }

    const template = parsed.data;
    if (this.templates.has(template.id)) {
      this.logger.warn(`Duplicate template rejected: ${template.id}`);
      return err(new DuplicateIdError('Weapon template', template.id));
    }

    const effectIds = new Set<string>();
    for (const effect of template.effects) {
      if (effectIds.has(effect.id)) {
        return err(new InvalidInputError(`Duplicate effect id in template: ${effect.id}`));
      }
      effectIds.add(effect.id);
    }

    this.templates.set(template.id, template);
    this.logger.log(`Template registered: ${template.id} (${template.category}/${template.rarity})`);
    return ok(template);
  }

  getTemplate(id: string): WeaponTemplate | undefined {
    return this.templates.get(id);
  }

  hasTemplate(id: string): boolean {
    return this.templates.has(id);
  }

  listTemplates(filter: TemplateFilter = {}): WeaponTemplate[] {
    const minValue = filter.minRarity ? RARITY_VALUE[filter.minRarity] : 0;
    return [...this.templates.values()].filter(
      (t) =>
        (!filter.category || t.category === filter.category) &&
        RARITY_VALUE[t.rarity] >= minValue,
    );
  }

  /** 스냅샷 복원 전용: 검증은 호출자가 끝낸 상태 */
  replaceAll(templates: WeaponTemplate[]): void {
    this.templates.clear();
    for (const t of templates) this.templates.set(t.id, t);
  }
}
