// Types
export * from './types/index';

// Duty statuses, rest-break kinds and HOS limits (49 CFR Part 395)
export * from './hos/index';

// Schemas
export * from './schemas/index';

// Utils
export * from './utils/index';
