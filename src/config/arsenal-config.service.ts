// 아스널 서버 설정: .env 기본값, 부팅 시 한 번 읽는다

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';

export interface ArsenalConfig {
  port: number;
  contentDir: string;
  /** 전투 밖 RNG 스트림 (활성화 판정, 제작, 분해) */
  seed: string;
  firstLevelExp: number;
  combatLogTail: number;
  loadContent: boolean;
  jwtSecret: string;
  /** x-player-id 헤더로 신원 지정 허용 (production 이 아니면 기본 허용) */
  allowHeaderIdentity: boolean;
}

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

@Injectable()
export class ArsenalConfigService {
  private readonly logger = new Logger(ArsenalConfigService.name);
  private readonly config: ArsenalConfig;

  constructor(overrides: Partial<ArsenalConfig> = {}) {
    this.config = {
      port: readInt('PORT', 3000),
      contentDir:
        process.env.ARSENAL_CONTENT_DIR ??
        join(process.cwd(), 'content', 'arsenal_v1'),
      seed: process.env.ARSENAL_SEED ?? 'arsenal',
      firstLevelExp: readInt('ARSENAL_FIRST_LEVEL_EXP', 1000),
      combatLogTail: readInt('COMBAT_LOG_TAIL', 5),
      loadContent: (process.env.ARSENAL_LOAD_CONTENT ?? 'true') !== 'false',
      jwtSecret: process.env.JWT_SECRET ?? 'dev-secret',
      allowHeaderIdentity: process.env.NODE_ENV !== 'production',
      ...overrides,
    };
    const { jwtSecret: _secret, ...printable } = this.config;
    this.logger.debug(`Arsenal config: ${JSON.stringify(printable)}`);
  }

  get(): ArsenalConfig {
    return this.config;
  }
}
