import type { InboundEventName } from '../../types/realtime';
import { createCard, joinBoard, leaveBoard, reorderCards, setTheme, setTitle, voteCard } from './board';
import { deleteMessage, editMessage, pinMessage, reactToMessage, sendMessage } from './chat';
import type { EventHandler } from './context';
import { joinDirect, markDirectRead } from './direct';
import { joinGroup } from './group';
import { moveCursor, setTyping } from './presence';

export { runHandler, isAckCallback, type EventHandler, type HandlerContext } from './context';

/** One handler per inbound event name. */
export const EVENT_HANDLERS: Record<InboundEventName, EventHandler> = {
  join_board: joinBoard,
  leave: leaveBoard,
  create_card: createCard,
  vote_card: voteCard,
  reorder_cards: reorderCards,
  send_chat: sendMessage('board'),
  chat_react: reactToMessage('board'),
  chat_pin: pinMessage,
  chat_edit: editMessage('board'),
  chat_delete: deleteMessage('board'),
  typing: setTyping('board', true),
  stop_typing: setTyping('board', false),
  cursor_move: moveCursor,
  set_theme: setTheme,
  set_title: setTitle,
  dm_join: joinDirect,
  dm_send: sendMessage('direct'),
  dm_typing: setTyping('direct', true),
  dm_stop_typing: setTyping('direct', false),
  dm_react: reactToMessage('direct'),
  dm_edit: editMessage('direct'),
  dm_delete: deleteMessage('direct'),
  dm_read: markDirectRead,
  group_join: joinGroup,
  group_send: sendMessage('group'),
  group_typing: setTyping('group', true),
  group_stop_typing: setTyping('group', false),
  group_react: reactToMessage('group'),
  group_edit: editMessage('group'),
  group_delete: deleteMessage('group'),
};
