import mongoose, { Schema } from 'mongoose';

interface CounterDocument {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<CounterDocument>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  {
    collection: 'counters',
    versionKey: false,
    strict: 'throw',
  }
);

const CounterModel =
  (mongoose.models.Counter as mongoose.Model<CounterDocument> | undefined) ??
  mongoose.model<CounterDocument>('Counter', counterSchema);

/** Atomically allocates the next integer in the named sequence, starting at 1. */
export async function nextSequence(name: string): Promise<number> {
  const counter = await CounterModel.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { upsert: true, new: true }
  ).lean<CounterDocument | null>();

  if (!counter) {
    throw new Error(`Counter ${name} could not be incremented`);
  }

  return counter.seq;
}
