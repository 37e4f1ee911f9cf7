// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/trip.js';
export * from './entities/schedule-item.js';
export * from './entities/objective-value.js';
export * from './entities/response.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/schedule-source.port.js';
export * from './ports/outbound/chart-viewer.port.js';
