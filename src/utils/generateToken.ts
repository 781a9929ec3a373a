import jwt from "jsonwebtoken";
import config from "../config";

const generateToken = (userId: string): string => {
  return jwt.sign({ userId }, config.jwtSecret, {
    expiresIn: config.jwtExpiresInSeconds,
  });
};

export default generateToken;
