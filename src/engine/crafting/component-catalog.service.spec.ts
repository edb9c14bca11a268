import { ComponentCatalogService } from './component-catalog.service.js';

describe('ComponentCatalogService', () => {
  let service: ComponentCatalogService;

  beforeEach(() => {
    service = new ComponentCatalogService();
  });

  it('등록 + 카테고리 조회', () => {
    service.registerComponent({ id: 'f1', name: 'Frame', category: 'FRAME', rarity: 'COMMON', craftingDifficulty: 2 });
    service.registerComponent({ id: 'b1', name: 'Barrel', category: 'BARREL', rarity: 'RARE', craftingDifficulty: 4 });

    expect(service.listComponents('FRAME').map((c) => c.id)).toEqual(['f1']);
    expect(service.listComponents()).toHaveLength(2);
    expect(service.getComponent('b1')?.compatibility).toEqual([]);
  });

  it('중복 거절', () => {
    const input = { id: 'f1', name: 'Frame', category: 'FRAME', rarity: 'COMMON', craftingDifficulty: 2 };
    service.registerComponent(input);
    const again = service.registerComponent(input);
    expect(!again.ok && again.error.code).toBe('DUPLICATE_ID');
  });

  it('필수 필드 누락', () => {
    const result = service.registerComponent({ id: 'f1', name: 'Frame', category: 'FRAME', rarity: 'COMMON' });
    expect(!result.ok && result.error.message).toBe('Missing required field: craftingDifficulty');
  });

  it('난이도 범위 밖', () => {
    const result = service.registerComponent({
      id: 'f1',
      name: 'Frame',
      category: 'FRAME',
      rarity: 'COMMON',
      craftingDifficulty: 11,
    });
    expect(!result.ok && result.error.code).toBe('INVALID_INPUT');
  });
});
