// src/server.ts
import { createApp } from './app';
import { connectDB } from './config/db';
import { AppConfig, loadConfig } from './config/env';
import { MemoryDataStore } from './repositories/memory/memory.store';
import { MongoDataStore } from './repositories/mongo/mongo.store';
import { DataStore } from './repositories/repository.types';
import { buildServices } from './services';

const createStore = async (config: AppConfig): Promise<DataStore> => {
  if (config.storeDriver === 'memory') {
    console.log('Using in-memory store; data is lost on restart');
    return new MemoryDataStore();
  }

  await connectDB(config.mongoURI);
  return new MongoDataStore();
};

const start = async (): Promise<void> => {
  const config = loadConfig();
  const store = await createStore(config);
  const services = buildServices(store, config);
  const app = createApp(services, config);

  app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📍 Environment: ${config.nodeEnv}`);
  });
};

start().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
