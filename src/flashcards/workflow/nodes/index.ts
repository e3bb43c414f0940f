export * from './analyze.node';
export * from './chunk.node';
export * from './generate.node';
export * from './aggregate.node';
export * from './supplement.node';
export * from './finalize.node';
