export * from './flashcard.types';
