// scripts/seed.ts
import { connectDB, disconnectDB } from '../src/config/db';
import { loadConfig } from '../src/config/env';
import { MongoDataStore } from '../src/repositories/mongo/mongo.store';
import { buildServices } from '../src/services';
import { ConflictError } from '../src/utils/errors';

const DEMO_PASSWORD = 'demo-password';

async function seed() {
  const config = loadConfig();
  if (config.isProduction) {
    console.error('Refusing to seed a production database');
    process.exit(1);
  }

  await connectDB(config.mongoURI);
  const services = buildServices(new MongoDataStore(), config);

  try {
    const register = async (username: string) => {
      const email = `${username}@example.com`;
      try {
        return (await services.users.register({ username, email, password: DEMO_PASSWORD })).user;
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        console.log(`${username} already exists, logging in`);
        return (await services.users.authenticate(email, DEMO_PASSWORD)).user;
      }
    };

    const alice = await register('alice');
    const bob = await register('bob');

    const root = await services.messages.send(alice.id, { receiverId: bob.id, content: 'Lunch on Friday?' });
    const reply = await services.messages.send(bob.id, {
      receiverId: alice.id,
      content: 'Sure, where?',
      parentMessageId: root.id
    });
    await services.messages.send(alice.id, {
      receiverId: bob.id,
      content: 'The usual place',
      parentMessageId: reply.id
    });
    await services.messages.edit(root.id, 'Lunch on Friday at noon?', alice.id);

    console.log(`Seeded thread ${root.id} between ${alice.username} and ${bob.username}`);
  } finally {
    await disconnectDB();
  }
}

seed().catch(error => {
  console.error('Error seeding database:', error);
  process.exit(1);
});
