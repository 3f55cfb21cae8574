// src/config/db.ts
import mongoose from 'mongoose';

export const connectDB = async (mongoURI: string | undefined): Promise<typeof mongoose> => {
  if (!mongoURI) {
    throw new Error('MongoDB connection string is not defined');
  }

  const connection = await mongoose.connect(mongoURI);
  console.log('MongoDB Connected');
  return connection;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  console.log('MongoDB Disconnected');
};

export default connectDB;
