export * from './generation-backend';
export * from './external-api.backend';
export * from './local-model.backend';
export * from './heuristic.backend';
export * from './generation-backend.factory';
