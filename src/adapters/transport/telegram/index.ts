export * from './telegram-bot.transport';
export * from './telegram.types';
