export * from './flashcard-errors';
