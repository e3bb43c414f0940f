export * from './types';
export * from './errors';
export * from './dto';
export { FlashcardsService } from './flashcards.service';
export { FlashcardsModule } from './flashcards.module';
