export type * from './types/protocol.js';
export type * from './types/defillama.js';
export type * from './types/report.js';
export type * from './types/api.js';
