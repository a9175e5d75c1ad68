import { randomBytes } from 'node:crypto';
import type { Board, BoardTheme } from '../types/board';
import { logger } from './logger';
import type { StorageGateway } from './storage-gateway';

export interface BoardTemplate {
  title: string;
  theme: BoardTheme;
  cards: ReadonlyArray<{ author: string; text: string; tag: string }>;
}

export const BOARD_TEMPLATES = {
  retro: {
    title: 'Sprint Retrospective',
    theme: 'mint',
    cards: [
      { author: 'Alice', text: 'What went well this sprint?', tag: '🟢' },
      { author: 'Bob', text: 'What slowed us down?', tag: '❓' },
      { author: 'Carol', text: 'Action items for next sprint', tag: '⚡️' },
    ],
  },
  kanban: {
    title: 'Kanban Standup',
    theme: 'violet',
    cards: [
      { author: 'Team', text: 'Todo', tag: '🟡' },
      { author: 'Team', text: 'In Progress', tag: '⚡️' },
      { author: 'Team', text: 'Blocked', tag: '🔴' },
    ],
  },
  brainstorm: {
    title: 'Brainstorm Board',
    theme: 'sunset',
    cards: [
      { author: 'Dana', text: 'Wild ideas', tag: '✨' },
      { author: 'Eli', text: 'Opportunities', tag: '🟢' },
      { author: 'Fran', text: 'Risks', tag: '🔴' },
    ],
  },
} as const satisfies Record<string, BoardTemplate>;

export type BoardTemplateKey = keyof typeof BOARD_TEMPLATES;

export function isBoardTemplateKey(value: unknown): value is BoardTemplateKey {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(BOARD_TEMPLATES, value);
}

/** Six lower-case hex characters. */
export function generateBoardCode(): string {
  return randomBytes(3).toString('hex');
}

const CODE_ATTEMPTS = 5;

export interface CreateBoardOptions {
  ownerId: string | null;
  template: string | null;
  generateCode?: () => string;
}

/**
 * Create a board with a fresh code. A known template sets the title, theme
 * and starter cards (ordered 0..n-1); unknown template keys are ignored.
 */
export async function createBoardFromTemplate(
  storage: StorageGateway,
  { ownerId, template, generateCode = generateBoardCode }: CreateBoardOptions,
): Promise<Board> {
  const templateKey = isBoardTemplateKey(template) ? template : null;

  let code = generateCode();
  for (let attempt = 1; attempt < CODE_ATTEMPTS; attempt++) {
    if (!(await storage.getBoardByCode(code))) break;
    code = generateCode();
  }

  const board = await storage.createBoard({ code, ownerId, template: templateKey });
  if (!templateKey) {
    return board;
  }

  const preset: BoardTemplate = BOARD_TEMPLATES[templateKey];
  const updated = await storage.updateBoard(board.id, { title: preset.title, theme: preset.theme });
  for (const [orderIndex, card] of preset.cards.entries()) {
    await storage.insertCard(board.id, {
      author: card.author,
      text: card.text,
      tag: card.tag,
      orderIndex,
      attachmentPath: null,
    });
  }
  logger.info('STORAGE', `Board ${code} created from template '${templateKey}'`, {
    boardId: board.id,
    template: templateKey,
  });
  return updated ?? board;
}
