// src/models/User.ts
import mongoose, { Schema, HydratedDocument } from 'mongoose';
import { UserRecord } from '../types/user.types';

export interface IUser {
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type UserDocument = HydratedDocument<IUser>;

const UserSchema = new Schema<IUser>(
  {
    username: {
      type: String,
      required: [true, 'Username is required'],
      unique: true,
      trim: true,
      minlength: 3,
      maxlength: 30
    },
    email: {
      type: String,
      required: [true, 'Email is required'],
      unique: true,
      trim: true,
      lowercase: true
    },
    // bcrypt hash, hashed by the user service before it reaches the model
    password: {
      type: String,
      required: true
    },
    firstName: {
      type: String,
      trim: true,
      default: ''
    },
    lastName: {
      type: String,
      trim: true,
      default: ''
    },
    isActive: {
      type: Boolean,
      default: true
    }
  },
  { timestamps: true }
);

export const toUserRecord = (doc: UserDocument): UserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  email: doc.email,
  firstName: doc.firstName,
  lastName: doc.lastName,
  passwordHash: doc.password,
  isActive: doc.isActive,
  createdAt: doc.createdAt
});

const User = mongoose.model<IUser>('User', UserSchema);

export default User;
