/** The subset of Bot API objects the moderator reads */

export type TgUser = { id: number; username?: string; firstName?: string };

export type TgMessage = {
  messageId: number;
  chatId: number;
  from?: TgUser;
  text?: string;
  caption?: string;
  hasPhoto: boolean;
};

export type TgCallbackQuery = {
  id: string;
  from: TgUser;
  data?: string;
  message?: TgMessage;
};

export type TgUpdate = {
  updateId: number;
  message?: TgMessage;
  callbackQuery?: TgCallbackQuery;
};

export type InlineButton = { text: string; callback_data: string };

export type InlineKeyboard = { inline_keyboard: InlineButton[][] };

export type ParseMode = "HTML";
