export * from './prompt-builder';
export * from './qa-response.parser';
export * from './pair-generator.service';
export * from './backends';
export * from './providers';
