import mongoose, { Schema } from "mongoose";

export interface INote {
  owner: string; // userId of the creator
  text: string;
  createdAt: Date;
  updatedAt: Date;
}

const NoteSchema = new Schema<INote>(
  {
    owner: {
      type: String,
      required: true,
    },
    text: {
      type: String,
      default: "",
    },
  },
  { timestamps: true } // Adds createdAt and updatedAt automatically
);

// Listing a user's notes and the user-deletion cascade both filter on owner
NoteSchema.index({ owner: 1, createdAt: 1 });

const Note = mongoose.model<INote>("Note", NoteSchema);

export default Note;
