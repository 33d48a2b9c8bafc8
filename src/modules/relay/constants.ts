/**
 * Injection tokens for the relay module
 */

export const RELAY_CONFIG = Symbol('RELAY_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const MESSAGE_TRANSPORT = Symbol('MESSAGE_TRANSPORT');
export const RUNTIME_SETTINGS = Symbol('RUNTIME_SETTINGS');
export const SOURCE_CHATS = Symbol('SOURCE_CHATS');
export const STATS_RECORDER = Symbol('STATS_RECORDER');
export const LINK_EXPANDER = Symbol('LINK_EXPANDER');
export const FORWARDING_PIPELINE = Symbol('FORWARDING_PIPELINE');
export const RETENTION_SCHEDULER = Symbol('RETENTION_SCHEDULER');
