export const ITEM_TYPES = ['note', 'image', 'document', 'photo'] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

export const isItemType = (value: unknown): value is ItemType =>
  typeof value === 'string' && (ITEM_TYPES as readonly string[]).includes(value);

export interface UserRecord {
  id: number;
  username: string;
  passwordHash: string;
}

export interface SessionRecord {
  id: number;
  userId: number;
  token: string;
  expiresAt: string;
  createdAt: string;
}
