import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { FlashcardsModule } from './flashcards.module';
import { FlashcardsService } from './flashcards.service';

describe('FlashcardsModule', () => {
  it('wires the pipeline end to end with the heuristic backend', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ GENERATION_BACKEND: 'heuristic' })],
        }),
        FlashcardsModule,
      ],
    }).compile();
    const service = moduleRef.get(FlashcardsService);

    const result = await service.generateFlashcards({
      text: 'The Pilgrims founded Plymouth Colony in 1620. It rained.',
      coverage: 'minimal',
      language: 'en',
    });

    expect(service.getHealth()).toEqual({
      workflowReady: true,
      backend: 'heuristic',
      capability: 'heuristic-extractor',
    });
    expect(result.targetCount).toBe(10);
    expect(result.backend).toBe('heuristic');
    expect(result.pairs).toEqual([
      {
        question: 'What is The Pilgrims founded Plymouth Colony in 1620?',
        answer: 'The Pilgrims founded Plymouth Colony in 1620',
      },
    ]);
  });
});
