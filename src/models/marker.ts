import mongoose, { Schema } from 'mongoose';

import type { CreateMarkerPersistenceInput, MarkerCategory, MarkerRecord } from '../types/marker';
import { MARKER_CATEGORIES } from '../types/marker';
import { nextSequence } from './counter';

const MARKER_SEQUENCE = 'markers';

interface MarkerDocument {
  _id: number;
  lat: number;
  lng: number;
  state: string;
  city: string;
  locality: string;
  category: MarkerCategory;
  contact: string;
  isActive: boolean;
  createdAt: Date;
}

const markerSchema = new Schema<MarkerDocument>(
  {
    _id: { type: Number, required: true },
    lat: { type: Number, required: true },
    lng: { type: Number, required: true },
    state: { type: String, required: true, trim: true, maxlength: 100 },
    city: { type: String, required: true, trim: true, maxlength: 100 },
    locality: { type: String, required: true, trim: true, maxlength: 200 },
    category: { type: String, required: true, enum: MARKER_CATEGORIES },
    contact: { type: String, required: true, trim: true, maxlength: 200 },
    isActive: { type: Boolean, required: true, default: true },
    createdAt: { type: Date, required: true, immutable: true },
  },
  {
    collection: 'markers',
    versionKey: false,
    strict: 'throw',
  }
);

const MarkerModel =
  (mongoose.models.Marker as mongoose.Model<MarkerDocument> | undefined) ??
  mongoose.model<MarkerDocument>('Marker', markerSchema);

function mapMarkerDocument(document: MarkerDocument): MarkerRecord {
  return {
    id: document._id,
    lat: document.lat,
    lng: document.lng,
    state: document.state,
    city: document.city,
    locality: document.locality,
    category: document.category,
    contact: document.contact,
    isActive: document.isActive,
    createdAt: document.createdAt ?? null,
  };
}

export async function syncMarkerIndexes(): Promise<void> {
  await MarkerModel.syncIndexes();
}

export async function listMarkerRecords(): Promise<MarkerRecord[]> {
  const docs = await MarkerModel.find().sort({ _id: 1 }).lean<MarkerDocument[]>();
  return docs.map(mapMarkerDocument);
}

export async function countMarkerRecords(): Promise<number> {
  return MarkerModel.countDocuments();
}

export async function createMarkerRecord(input: CreateMarkerPersistenceInput): Promise<MarkerRecord> {
  const id = await nextSequence(MARKER_SEQUENCE);
  const doc = await MarkerModel.create({
    _id: id,
    lat: input.lat,
    lng: input.lng,
    state: input.state,
    city: input.city,
    locality: input.locality,
    category: input.category,
    contact: input.contact,
    isActive: true,
    createdAt: input.createdAt,
  });
  return mapMarkerDocument(doc);
}

export async function removeMarkerRecord(markerId: number): Promise<{ removed: boolean }> {
  const result = await MarkerModel.deleteOne({ _id: markerId });
  return { removed: result.deletedCount > 0 };
}

export async function setMarkerActiveRecord(markerId: number, isActive: boolean): Promise<MarkerRecord | null> {
  const doc = await MarkerModel.findOneAndUpdate(
    { _id: markerId },
    { $set: { isActive } },
    { new: true }
  ).lean<MarkerDocument | null>();

  return doc ? mapMarkerDocument(doc) : null;
}
