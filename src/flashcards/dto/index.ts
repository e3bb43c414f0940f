export * from './generate-flashcards.dto';
