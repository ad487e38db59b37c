// @parley/types -- barrel export
export type * from './common.js';
export type * from './config.js';
export type * from './storage.js';
export type * from './gateway.js';

// 런타임 값 (const enum 대체)
export { GATEWAY_OPCODES, GATEWAY_CLOSE_CODES } from './gateway.js';

// 브랜드 팩토리 함수
export { createSessionId } from './common.js';
