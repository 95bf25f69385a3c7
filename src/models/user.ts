import mongoose, { Schema, type Types } from 'mongoose';

import type { CreateUserInput, UserRecord, UserRole } from '../types/user';
import { USER_ROLES } from '../types/user';

interface UserDocument {
  _id: Types.ObjectId;
  username: string;
  passwordHash: string;
  role: UserRole;
}

const userSchema = new Schema<UserDocument>(
  {
    username: { type: String, required: true, trim: true, unique: true, maxlength: 80 },
    passwordHash: { type: String, required: true },
    role: { type: String, required: true, enum: USER_ROLES, default: 'user' },
  },
  {
    collection: 'users',
    versionKey: false,
    strict: 'throw',
  }
);

const UserModel =
  (mongoose.models.User as mongoose.Model<UserDocument> | undefined) ??
  mongoose.model<UserDocument>('User', userSchema);

function mapUserDocument(document: UserDocument): UserRecord {
  return {
    id: document._id.toString(),
    username: document.username,
    passwordHash: document.passwordHash,
    role: document.role,
  };
}

export async function syncUserIndexes(): Promise<void> {
  await UserModel.syncIndexes();
}

export async function findUserByUsername(username: string): Promise<UserRecord | null> {
  const doc = await UserModel.findOne({ username }).lean<UserDocument | null>();
  return doc ? mapUserDocument(doc) : null;
}

export async function countUserRecords(): Promise<number> {
  return UserModel.countDocuments();
}

export async function createUserRecords(inputs: CreateUserInput[]): Promise<UserRecord[]> {
  const docs = await UserModel.insertMany(inputs);
  return docs.map(mapUserDocument);
}
