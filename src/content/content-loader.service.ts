// arsenal_v1 정적 카탈로그 (weapons.json / components.json) 로드 → 카탈로그 등록

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ArsenalConfigService } from '../config/arsenal-config.service.js';
import { InternalError } from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';
import { WeaponCatalogService } from '../engine/arsenal/weapon-catalog.service.js';
import { ComponentCatalogService } from '../engine/crafting/component-catalog.service.js';
import { ComponentSchema, WeaponTemplateSchema } from '../types/index.js';

const WeaponFileSchema = z.array(WeaponTemplateSchema);
const ComponentFileSchema = z.array(ComponentSchema);

export interface ContentSummary {
  templates: number;
  components: number;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private summary: ContentSummary = { templates: 0, components: 0 };

  constructor(
    private readonly config: ArsenalConfigService,
    private readonly catalog: WeaponCatalogService,
    private readonly components: ComponentCatalogService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.get().loadContent) {
      this.logger.log('Static content loading disabled');
      return;
    }
    this.summary = await this.loadAll(this.config.get().contentDir);
  }

  getSummary(): ContentSummary {
    return { ...this.summary };
  }

  /** 파일 전체를 검증한 뒤 등록. 잘못된 파일은 부팅을 막는다 */
  async loadAll(dir: string): Promise<ContentSummary> {
    const [weaponsRaw, componentsRaw] = await Promise.all([
      readFile(join(dir, 'weapons.json'), 'utf-8'),
      readFile(join(dir, 'components.json'), 'utf-8'),
    ]);

    const weapons = this.parseFile('weapons.json', weaponsRaw, WeaponFileSchema);
    const parts = this.parseFile('components.json', componentsRaw, ComponentFileSchema);

    let templates = 0;
    for (const weapon of weapons) {
      const result = this.catalog.registerTemplate(weapon);
      if (result.ok) templates++;
      else this.logger.warn(`Skipped weapon ${weapon.id}: ${result.error.message}`);
    }

    let components = 0;
    for (const part of parts) {
      const result = this.components.registerComponent(part);
      if (result.ok) components++;
      else this.logger.warn(`Skipped component ${part.id}: ${result.error.message}`);
    }

    this.logger.log(`Content loaded from ${dir}: ${templates} weapons, ${components} components`);
    return { templates, components };
  }

  private parseFile<T>(file: string, raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new InternalError(`${file} is not valid JSON`, { file, cause: String(error) });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new InternalError(`${file} failed validation`, { file, issues: formatZodIssues(parsed.error) });
    }
    return parsed.data;
  }
}
