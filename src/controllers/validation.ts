import Joi from "joi";

export interface LoginBody {
  id: string;
  pw: string;
}

export interface WriteNoteBody {
  text: string;
}

export interface AddUserBody {
  id: string;
  pw: string;
}

// Joi schema for login; the id is upper-cased before lookup
export const loginSchema = Joi.object<LoginBody>({
  id: Joi.string().trim().min(1).required(),
  pw: Joi.string().required(),
});

// Joi schema for writing a note
export const writeNoteSchema = Joi.object<WriteNoteBody>({
  text: Joi.string().allow("").max(10000).required(),
});

// Joi schema for the admin "add user" form. Id rules (no spaces or quotes,
// case-insensitive uniqueness) are enforced by the coordinator.
export const addUserSchema = Joi.object<AddUserBody>({
  id: Joi.string().min(1).max(64).required(),
  pw: Joi.string().min(1).required(),
});
