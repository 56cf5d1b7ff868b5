import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { IndexBatchDto } from './index-batch.dto';

describe('IndexBatchDto', () => {
  it('leaves per-item vector checks to indexing', async () => {
    const dto = plainToInstance(IndexBatchDto, {
      items: [
        { vector: [1, 0], metadata: { id: 'a' } },
        { vector: [0, 1], metadata: { id: 'b' } },
        { vector: [1, 'x'], metadata: { id: 'c' } },
        { vector: [1, 1], metadata: { id: 'd' } },
      ],
    });

    await expect(validate(dto)).resolves.toEqual([]);
  });

  it('requires an array of objects', async () => {
    const errors = await validate(plainToInstance(IndexBatchDto, { items: [1, 2] }));

    expect(errors.map((error) => error.property)).toEqual(['items']);
  });
});
