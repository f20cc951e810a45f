import { formatByteLimit } from '../utils/byteLimit';
import { isItemType, type ItemType } from '../db/types';
import { NotFoundError, ValidationError } from '../errors';
import type { ItemRepository } from '../repositories/itemRepository';
import type { UserRepository } from '../repositories/userRepository';

export interface ItemStoreOptions {
  maxContentBytes: number;
}

const toBuffer = (content: Uint8Array) =>
  Buffer.isBuffer(content) ? content : Buffer.from(content.buffer, content.byteOffset, content.byteLength);

export const createItemStore = (items: ItemRepository, users: UserRepository, options: ItemStoreOptions) => {
  const save = (userId: number, type: ItemType, content: Uint8Array): number => {
    if (!isItemType(type)) {
      throw new ValidationError(`Unsupported item type: ${String(type)}`);
    }
    const buffer = toBuffer(content);
    if (type === 'note' && buffer.toString('utf8').trim().length === 0) {
      throw new ValidationError('Note content cannot be empty.');
    }
    if (buffer.byteLength > options.maxContentBytes) {
      throw new ValidationError(`File exceeds the ${formatByteLimit(options.maxContentBytes)} size limit.`);
    }
    if (!users.getUserById(userId)) {
      throw new NotFoundError(`User ${userId} does not exist`);
    }

    const id = items.insertItem(userId, type, buffer);
    console.log(`[items] saved ${type} #${id} (${buffer.byteLength} bytes) for user ${userId}`);
    return id;
  };

  return { save };
};

export type ItemStore = ReturnType<typeof createItemStore>;
