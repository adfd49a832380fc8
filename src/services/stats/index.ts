export { type ConversationStats, type StatsTimeRange, computeConversationStats } from "./ConversationStats";
