import { describe, it, expect, beforeEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { createMemoryDatabase } from '../../persistence/database.js';
import { CatalogRepository } from '../../persistence/repositories/CatalogRepository.js';
import { SubscriberRepository } from '../../persistence/repositories/SubscriberRepository.js';

describe('CatalogRepository', () => {
  let db: Database;
  let catalog: CatalogRepository;

  beforeEach(() => {
    db = createMemoryDatabase();
    catalog = new CatalogRepository(db);
  });

  it('labels a chat with its id until a name is known', () => {
    expect(catalog.add('-100').displayName).toBe('-100');

    catalog.updateDisplayName('-100', 'News');

    expect(catalog.get('-100')?.displayName).toBe('News');
  });

  it('soft-deactivates and reactivates chats', () => {
    catalog.add('-100', 'News');

    expect(catalog.deactivate('-100')).toBe(true);
    expect(catalog.get('-100')?.active).toBe(false);
    expect(catalog.listActive()).toEqual([]);
    expect(catalog.listAll()).toHaveLength(1);

    const entry = catalog.add('-100');
    expect(entry.active).toBe(true);
    expect(entry.displayName).toBe('News');
  });

  it('reports unknown chats on deactivate', () => {
    expect(catalog.deactivate('-999')).toBe(false);
    expect(catalog.get('-999')).toBeNull();
  });

  it('seeds only chats it does not know yet', () => {
    catalog.add('-100', 'News');
    catalog.deactivate('-100');

    expect(catalog.seed(['-100', '-200', '-300'])).toBe(2);
    expect(catalog.get('-100')?.active).toBe(false);
    expect(catalog.listActive().map((entry) => entry.chatId)).toEqual(['-200', '-300']);
  });
});

describe('SubscriberRepository', () => {
  let subscribers: SubscriberRepository;

  beforeEach(() => {
    subscribers = new SubscriberRepository(createMemoryDatabase());
  });

  it('subscribes idempotently', () => {
    subscribers.subscribe('r1', '-100');
    subscribers.subscribe('r1', '-100');

    expect(subscribers.getSubscribers('-100')).toEqual(['r1']);
    expect(subscribers.getRecipientChats('r1')).toEqual(['-100']);
  });

  it('lists subscribers of a chat in id order', () => {
    subscribers.subscribe('r2', '-100');
    subscribers.subscribe('r1', '-100');
    subscribers.subscribe('r3', '-200');

    expect(subscribers.getSubscribers('-100')).toEqual(['r1', 'r2']);
  });

  it('unsubscribes', () => {
    subscribers.subscribe('r1', '-100');

    expect(subscribers.unsubscribe('r1', '-100')).toBe(true);
    expect(subscribers.unsubscribe('r1', '-100')).toBe(false);
    expect(subscribers.getSubscribers('-100')).toEqual([]);
  });

  it('keeps known profile fields when a recipient is registered again', () => {
    subscribers.ensureRecipient('r1', 'ivan', 'Ivan Petrov');
    subscribers.ensureRecipient('r1');
    subscribers.ensureRecipient('r2');

    expect(subscribers.listRecipients()).toEqual([
      { recipientId: 'r1', username: 'ivan', name: 'Ivan Petrov' },
      { recipientId: 'r2' },
    ]);
  });
});
