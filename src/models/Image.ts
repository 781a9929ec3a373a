import mongoose, { Schema } from "mongoose";

export interface IImage {
  imageId: string; // sha1(uploadedAt + filename)
  owner: string;
  filename: string;
  uploadedAt: string;
}

const ImageSchema = new Schema<IImage>({
  imageId: {
    type: String,
    required: true,
    unique: true,
  },
  owner: {
    type: String,
    required: true,
  },
  filename: {
    type: String,
    required: true,
  },
  uploadedAt: {
    type: String,
    required: true,
  },
});

ImageSchema.index({ owner: 1, uploadedAt: 1 });

const Image = mongoose.model<IImage>("Image", ImageSchema);

export default Image;
