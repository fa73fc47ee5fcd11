import { once } from 'events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from '../app.js';
import { openDatabase } from '../config/database.js';
import { createShutdown } from './shutdown.js';

describe('createShutdown', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('closes the server and the store once, however many signals arrive', async () => {
    const db = openDatabase(':memory:');
    const server = createApp(db).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const exit = vi.fn();

    const shutdown = createShutdown(server, db, exit);
    shutdown('SIGINT');
    shutdown('SIGINT');
    shutdown('SIGTERM');

    await vi.waitFor(() => expect(exit).toHaveBeenCalled());
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(server.listening).toBe(false);
    expect(db.open).toBe(false);
  });
});
