export * from './codec';
export * from './commands';
export * from './constants';
export * from './discovery';
export * from './enums';
export * from './errors';
export * from './powertag-gateway';
export * from './register-map';
export * from './snapshot';
export * from './transport';
export { assertUnitId, parseUnitIds, withTimeout } from './utils';
