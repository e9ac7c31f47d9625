import { Test, TestingModule } from '@nestjs/testing';
import { ObjectId } from 'mongodb';
import { MongoService } from '../../../mongo/mongo.service';
import { MongoReminderRepository } from './mongo-reminder.repository';
import { ReminderSchema } from './reminder.types';

describe('MongoReminderRepository', () => {
  const collection = {
    insertOne: jest.fn(),
    find: jest.fn(),
    findOne: jest.fn(),
    deleteOne: jest.fn(),
  };
  const mongo = { collection: jest.fn().mockReturnValue(collection) };
  let repository: MongoReminderRepository;

  const reminder: ReminderSchema = {
    userId: 'user-1',
    title: 'Call mom',
    date: '2026-10-20',
    time: '17:00',
    created_at: new Date('2026-10-19T08:15:00.000Z'),
    updated_at: new Date('2026-10-19T08:15:00.000Z'),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoReminderRepository,
        { provide: MongoService, useValue: mongo },
      ],
    }).compile();

    repository = module.get<MongoReminderRepository>(MongoReminderRepository);
  });

  it('uses the configured collection', () => {
    expect(mongo.collection).toHaveBeenCalledWith('reminders');
  });

  it('inserts a copy and returns the new id', async () => {
    const insertedId = new ObjectId();
    collection.insertOne.mockResolvedValue({ insertedId });

    await expect(repository.insert(reminder)).resolves.toBe(insertedId);
    expect(collection.insertOne).toHaveBeenCalledWith(reminder);
    expect(collection.insertOne.mock.calls[0][0]).not.toBe(reminder);
  });

  it('finds reminders by user', async () => {
    const docs = [{ ...reminder, _id: new ObjectId() }];
    collection.find.mockReturnValue({ toArray: jest.fn().mockResolvedValue(docs) });

    await expect(repository.findByUser('user-1')).resolves.toBe(docs);
    expect(collection.find).toHaveBeenCalledWith({ userId: 'user-1' });
  });

  it('finds one reminder by id', async () => {
    const _id = new ObjectId();
    collection.findOne.mockResolvedValue({ ...reminder, _id });

    await expect(repository.findById(_id.toHexString())).resolves.toEqual({
      ...reminder,
      _id,
    });
    expect(collection.findOne).toHaveBeenCalledWith({ _id });
  });

  it('treats a malformed id as not found', async () => {
    await expect(repository.findById('not-an-id')).resolves.toBeNull();
    expect(collection.findOne).not.toHaveBeenCalled();
  });

  it('deletes by id and user', async () => {
    const _id = new ObjectId();
    collection.deleteOne.mockResolvedValue({ deletedCount: 1 });

    await expect(
      repository.deleteByIdAndUser(_id.toHexString(), 'user-1'),
    ).resolves.toBe(1);
    expect(collection.deleteOne).toHaveBeenCalledWith({
      _id,
      userId: 'user-1',
    });
  });

  it('deletes nothing for a malformed id', async () => {
    await expect(
      repository.deleteByIdAndUser('not-an-id', 'user-1'),
    ).resolves.toBe(0);
    expect(collection.deleteOne).not.toHaveBeenCalled();
  });
});
