import { beforeEach, describe, expect, it } from 'vitest';
import { boardRoom } from '../../lib/room-keys';
import { generateColor } from '../../lib/utils';
import { ALICE, BOB, createHarness, type Harness } from '../test-utils';

const CODE = 'abc123';

describe('presence handlers', () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await h.storage.createBoard({ code: CODE, ownerId: null, template: null });
    h.connect('c1', ALICE);
    h.connect('c2', BOB);
    await h.emit('c1', 'join_board', { code: CODE });
    await h.emit('c2', 'join_board', { code: CODE });
    h.transport.clear();
  });

  describe('typing', () => {
    it('shows the typing list to everyone but the typist', async () => {
      await h.emit('c1', 'typing', { code: CODE, author: 'Alice' });

      expect(h.transport.deliveries).toEqual([
        { connId: 'c2', event: 'typing', payload: { code: CODE, authors: ['Alice'] } },
      ]);
      expect(h.services.typing.pendingRooms()).toBe(1);
    });

    it('clears the flag on stop_typing', async () => {
      await h.emit('c1', 'typing', { code: CODE, author: 'Alice' });
      await h.emit('c1', 'stop_typing', { code: CODE });

      expect(h.transport.last('c2', 'typing')).toEqual({ code: CODE, authors: [] });
    });

    it('names anonymous typists Anon', async () => {
      await h.emit('c2', 'typing', { code: CODE });
      expect(h.transport.last('c1', 'typing')).toEqual({ code: CODE, authors: ['Anon'] });
    });

    it('ignores connections outside the room', async () => {
      h.connect('c3', null, 'Robin');
      await h.emit('c3', 'typing', { code: CODE, author: 'Robin' });

      expect(h.transport.deliveries).toEqual([]);
      expect(h.services.registry.typingAuthors(boardRoom(CODE))).toEqual([]);
    });

    it('drops the typing entry when the typist disconnects', async () => {
      await h.emit('c1', 'typing', { code: CODE, author: 'Alice' });
      await h.disconnect('c1');

      expect(h.transport.last('c2', 'typing')).toEqual({ code: CODE, authors: [] });
    });
  });

  describe('cursor_move', () => {
    it('shares cursors with the rest of the room', async () => {
      await h.emit('c1', 'cursor_move', { code: CODE, pos: { x: 10, y: 20 }, color: '#ff0000', author: 'Alice' });

      expect(h.transport.deliveries).toEqual([
        { connId: 'c2', event: 'cursors', payload: [{ x: 10, y: 20, color: '#ff0000', author: 'Alice' }] },
      ]);
    });

    it('replaces bad coordinates and colors', async () => {
      await h.emit('c1', 'cursor_move', { code: CODE, pos: { x: 'left', y: Number.NaN }, color: 'red' });

      expect(h.transport.last('c2', 'cursors')).toEqual([
        { x: null, y: null, color: generateColor('c1'), author: 'Anon' },
      ]);
    });

    it('removes the cursor when its owner leaves', async () => {
      await h.emit('c1', 'cursor_move', { code: CODE, pos: { x: 1, y: 1 }, color: '#000' });
      await h.emit('c1', 'leave', { code: CODE });

      expect(h.transport.last('c2', 'cursors')).toEqual([]);
    });

    it('removes the cursor when its owner disconnects', async () => {
      await h.emit('c2', 'cursor_move', { code: CODE, pos: { x: 5, y: 6 }, color: '#00ff00', author: 'Bob' });
      await h.emit('c1', 'cursor_move', { code: CODE, pos: { x: 1, y: 2 }, color: '#ff0000', author: 'Alice' });
      expect(h.transport.last('c2', 'cursors')).toEqual([
        { x: 5, y: 6, color: '#00ff00', author: 'Bob' },
        { x: 1, y: 2, color: '#ff0000', author: 'Alice' },
      ]);

      await h.disconnect('c1');

      expect(h.transport.last('c2', 'cursors')).toEqual([{ x: 5, y: 6, color: '#00ff00', author: 'Bob' }]);
    });

    it('requires a board code', async () => {
      expect(await h.emit('c1', 'cursor_move', { pos: { x: 1, y: 1 } })).toEqual({
        ok: false,
        code: 'validation',
        message: 'Missing board code',
      });
    });
  });
});
