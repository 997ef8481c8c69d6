export const CHAT_PLATFORM_PORT: unique symbol = Symbol('CHAT_PLATFORM_PORT');
