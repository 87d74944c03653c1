import { customAlphabet } from 'nanoid';

export type UuidProvider = () => string;

const UuidAlphabet = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const uuidProvider: UuidProvider = customAlphabet(UuidAlphabet, 10);
