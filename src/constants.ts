/**
 * Shared file and directory names
 */
export const CHATSIFT_DIR = ".chatsift";
export const CONFIG_FILE = "config.json";
export const MESSAGES_FILE = "messages.json";
export const DEDUP_INDEX_FILE = "dedup-index.json";
export const LOG_FILE = "chatsift.log";
