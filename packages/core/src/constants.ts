/**
 * Bound shared by the log bus and the outbound broadcast queue
 */
export const DEFAULT_CHANNEL_CAPACITY = 1024;
