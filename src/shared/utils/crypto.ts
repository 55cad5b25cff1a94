import bcrypt from "bcryptjs";
import { v4 as uuidv4 } from "uuid";

// Password hashing utilities
export const hashPassword = async (password: string, saltRounds: number = 12): Promise<string> => {
  return bcrypt.hash(password, saltRounds);
};

export const verifyPassword = async (password: string, hash: string): Promise<boolean> => {
  return bcrypt.compare(password, hash);
};

// Generate correlation ID
export const generateCorrelationId = (): string => {
  return uuidv4();
};
