import { Injectable } from '@nestjs/common';
import { Collection, ObjectId } from 'mongodb';
import appConfig from '../../../config/app.config';
import { MongoService } from '../../../mongo/mongo.service';
import { ReminderRepository } from './reminder.repository';
import { ReminderSchema, StoredReminder } from './reminder.types';

@Injectable()
export class MongoReminderRepository extends ReminderRepository {
  private readonly collection: Collection<ReminderSchema>;

  constructor(mongo: MongoService) {
    super();
    this.collection = mongo.collection<ReminderSchema>(
      appConfig().mongo.remindersCollection,
    );
  }

  async insert(reminder: ReminderSchema): Promise<ObjectId> {
    // the driver writes _id back into the object it is given
    const result = await this.collection.insertOne({ ...reminder });
    return result.insertedId;
  }

  async findByUser(userId: string): Promise<StoredReminder[]> {
    return this.collection.find({ userId }).toArray();
  }

  async findById(id: string): Promise<StoredReminder | null> {
    if (!ObjectId.isValid(id)) return null;
    return this.collection.findOne({ _id: new ObjectId(id) });
  }

  async deleteByIdAndUser(id: string, userId: string): Promise<number> {
    if (!ObjectId.isValid(id)) return 0;
    const result = await this.collection.deleteOne({
      _id: new ObjectId(id),
      userId,
    });
    return result.deletedCount;
  }
}
