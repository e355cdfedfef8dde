// Fixed customer-facing texts. Nothing here is generated; the bot speaks Russian.
export const replies = {
  welcome: (name?: string) =>
    `Здравствуйте${name ? `, ${name}` : ''}! 🎂 Я помощник магазина бенто-тортов. ` +
    'Спросите меня о тортах, ценах, сроках и условиях заказа: можно текстом или голосовым сообщением.',
  apology: 'Извините, произошла ошибка при обработке вашего запроса. Пожалуйста, попробуйте позже.',
  transcriptionFailed:
    'Извините, не удалось распознать голосовое сообщение. Попробуйте ещё раз или напишите текстом.',
  refused: 'Извините, я не могу ответить на этот вопрос. Давайте лучше поговорим о наших тортах! 🎂',
  emptyMessage: 'Напишите, пожалуйста, ваш вопрос о тортах, и я с радостью помогу.',
  unsupported: 'Я понимаю только текстовые и голосовые сообщения.',
  unexpected: 'Произошла непредвиденная ошибка. Пожалуйста, попробуйте позже.',
  notAdmin: 'Эта команда недоступна.'
} as const;
