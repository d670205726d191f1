import { Test } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { Types } from 'mongoose';
import { documentValidationError, mockModel, mockQuery } from '../../../../test/mongo-mocks';
import { ValidationError } from '../../../common/errors/eduhub.errors';
import { Course } from '../schemas/course.schema';
import { CourseRepo } from './course.repo';

describe('CourseRepo', () => {
  const model = mockModel();
  let repo: CourseRepo;
  const instructorId = new Types.ObjectId('65f0a1b2c3d4e5f601234567');

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [CourseRepo, { provide: getModelToken(Course.name), useValue: model }],
    }).compile();
    repo = moduleRef.get(CourseRepo);
  });

  it('lets the validator reject a negative price', async () => {
    model.create.mockRejectedValue(documentValidationError());

    await expect(
      repo.create({ title: 'T', instructorId, category: 'C', level: 'beginner', price: -1, isPublished: false }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('answers exists from the store', async () => {
    const _id = new Types.ObjectId();
    model.exists.mockReturnValueOnce(mockQuery({ _id })).mockReturnValueOnce(mockQuery(null));

    await expect(repo.exists(_id)).resolves.toBe(true);
    await expect(repo.exists(_id)).resolves.toBe(false);
    expect(model.exists).toHaveBeenCalledWith({ _id });
  });

  it('lists newest courses first', async () => {
    const query = mockQuery([]);
    model.find.mockReturnValue(query);

    await repo.list({ category: 'Data' });

    expect(model.find).toHaveBeenCalledWith({ category: 'Data' });
    expect(query.sort).toHaveBeenCalledWith({ createdAt: -1 });
    expect(query.limit).toHaveBeenCalledWith(50);
    expect(query.skip).toHaveBeenCalledWith(0);
  });
});
