// external imports
import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Collection, Document, MongoClient } from 'mongodb';

// internal imports
import appConfig from '../config/app.config';

@Injectable()
export class MongoService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MongoService.name);

  // single client per process, shared by every repository
  private readonly client = new MongoClient(appConfig().mongo.uri);

  async onModuleInit() {
    await this.client.connect();
    this.logger.log(`Connected to MongoDB database ${appConfig().mongo.database}`);
  }

  async onModuleDestroy() {
    await this.client.close();
  }

  collection<T extends Document>(name: string): Collection<T> {
    return this.client.db(appConfig().mongo.database).collection<T>(name);
  }
}
