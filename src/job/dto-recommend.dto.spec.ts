import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { RecommendFromResumeDto } from './dto-recommend-from-resume.dto';
import { RecommendDto } from './dto-recommend.dto';

describe('recommendation DTOs', () => {
  const pipe = new ValidationPipe({ whitelist: true, transform: true });

  it('accepts a valid body and strips unknown fields', async () => {
    const dto = await pipe.transform({ skills: ['Python'], topN: 3, debug: true }, { type: 'body', metatype: RecommendDto });

    expect(dto).toBeInstanceOf(RecommendDto);
    expect(dto).toEqual({ skills: ['Python'], topN: 3 });
  });

  it('rejects a skills field that is not a list', async () => {
    const result = pipe.transform({ skills: 'Python' }, { type: 'body', metatype: RecommendDto });

    await expect(result).rejects.toBeInstanceOf(BadRequestException);
    await expect(result).rejects.toMatchObject({
      response: { message: expect.arrayContaining(['skills must be an array']) },
    });
  });

  it('caps topN at 50', async () => {
    const result = pipe.transform({ skills: [], topN: 51 }, { type: 'body', metatype: RecommendDto });

    await expect(result).rejects.toMatchObject({
      response: { message: ['topN must not be greater than 50'] },
    });
  });

  it('converts multipart topN strings to numbers', async () => {
    const dto = await pipe.transform({ topN: '3', resumeText: 'Python' }, { type: 'body', metatype: RecommendFromResumeDto });

    expect(dto).toEqual({ topN: 3, resumeText: 'Python' });
  });
});
