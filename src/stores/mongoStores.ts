import mongoose from "mongoose";
import User from "../models/User";
import Note from "../models/Note";
import Image from "../models/Image";
import {
  CredentialStore,
  ImageMetadataStore,
  ImageRecord,
  NoteRecord,
  NoteStore,
} from "./types";
import { ConflictError } from "../utils/errors";

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

const toImageRecord = (image: {
  imageId: string;
  owner: string;
  filename: string;
  uploadedAt: string;
}): ImageRecord => ({
  imageId: image.imageId,
  ownerId: image.owner,
  filename: image.filename,
  uploadedAt: image.uploadedAt,
});

export class MongoCredentialStore implements CredentialStore {
  async verify(userId: string, password: string): Promise<boolean> {
    const user = await User.findOne({ userId });
    return user ? user.comparePassword(password) : false;
  }

  async exists(userId: string): Promise<boolean> {
    return (await User.exists({ userId })) !== null;
  }

  async listUserIds(): Promise<Set<string>> {
    const users = await User.find({}, { userId: 1 }).lean();
    return new Set(users.map((user) => user.userId));
  }

  async createUser(userId: string, password: string): Promise<void> {
    try {
      await User.create({ userId, password }); // Hashed by the pre-save hook
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError("User already exists", "USER_DUPLICATE", {
          userId,
        });
      }
      throw error;
    }
  }

  async deleteUser(userId: string): Promise<boolean> {
    const result = await User.deleteOne({ userId });
    return result.deletedCount > 0;
  }
}

export class MongoNoteStore implements NoteStore {
  async insertNote(ownerId: string, text: string): Promise<string> {
    const note = await Note.create({ owner: ownerId, text });
    return note._id.toString();
  }

  async listNotesFor(ownerId: string): Promise<NoteRecord[]> {
    const notes = await Note.find({ owner: ownerId })
      .sort({ createdAt: 1 })
      .lean();
    return notes.map((note) => ({
      noteId: note._id.toString(),
      ownerId: note.owner,
      text: note.text,
      createdAt: note.createdAt,
    }));
  }

  async ownerOfNote(noteId: string): Promise<string | null> {
    if (!mongoose.Types.ObjectId.isValid(noteId)) {
      return null;
    }
    const note = await Note.findById(noteId, { owner: 1 }).lean();
    return note ? note.owner : null;
  }

  async deleteNote(noteId: string): Promise<boolean> {
    if (!mongoose.Types.ObjectId.isValid(noteId)) {
      return false;
    }
    const result = await Note.deleteOne({ _id: noteId });
    return result.deletedCount > 0;
  }

  async deleteNotesFor(ownerId: string): Promise<number> {
    const result = await Note.deleteMany({ owner: ownerId });
    return result.deletedCount;
  }
}

export class MongoImageMetadataStore implements ImageMetadataStore {
  async insertImage(record: ImageRecord): Promise<void> {
    try {
      await Image.create({
        imageId: record.imageId,
        owner: record.ownerId,
        filename: record.filename,
        uploadedAt: record.uploadedAt,
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError("Image id already in use", "IMAGE_ID_CONFLICT", {
          imageId: record.imageId,
        });
      }
      throw error;
    }
  }

  async listImagesFor(ownerId: string): Promise<ImageRecord[]> {
    const images = await Image.find({ owner: ownerId })
      .sort({ uploadedAt: 1 })
      .lean();
    return images.map(toImageRecord);
  }

  async listAllImages(): Promise<ImageRecord[]> {
    const images = await Image.find({}).lean();
    return images.map(toImageRecord);
  }

  async findImage(imageId: string): Promise<ImageRecord | null> {
    const image = await Image.findOne({ imageId }).lean();
    return image ? toImageRecord(image) : null;
  }

  async ownerOfImage(imageId: string): Promise<string | null> {
    const image = await Image.findOne({ imageId }, { owner: 1 }).lean();
    return image ? image.owner : null;
  }

  async deleteImageMeta(imageId: string): Promise<boolean> {
    const result = await Image.deleteOne({ imageId });
    return result.deletedCount > 0;
  }
}
