export * from './enums.js';
export * from './effect.js';
export * from './weapon.js';
export * from './component.js';
export * from './combat.js';
export * from './result.js';
