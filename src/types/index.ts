// ===========================================
// MENTION MONITOR - TYPE DEFINITIONS
// ===========================================

// ============ ENUMS ============

export enum NotificationMode {
  LEGACY = 'legacy',
  LEADERBOARD = 'leaderboard'
}

export enum SessionState {
  INITIALIZING = 'INITIALIZING',
  POLLING = 'POLLING',
  COMPLETED = 'COMPLETED'
}

// ============ CONFIG TYPES ============

export interface MonitorConfig {
  durationHours: number;
  pollIntervalMinSeconds: number;
  pollIntervalMaxSeconds: number;
  initialSearchLimit: number;
  pollSearchLimit: number;
}

export interface LeaderboardConfig {
  intervalMinutes: number;
  size: number;
}

export interface AppConfig {
  telegramBotToken: string;
  telegramChannelIds: string[];
  twitterBearerToken: string;
  twitterConsumerKey: string;
  twitterConsumerSecret: string;
  defaultMode: NotificationMode;
  recordsDir: string;
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';

  monitor: MonitorConfig;
  leaderboard: LeaderboardConfig;
}

// ============ TOKEN TYPES ============

export interface TokenMetadata {
  name: string | null;
  ticker: string | null;  // rendered with a leading "$"
  chain: string | null;
}

export interface TokenStats {
  address: string;
  displayName: string | null;
  ticker: string | null;
  chain: string | null;
  subscriberChannels: Set<string>;
  startTime: number;  // epoch ms

  initialTotal: number;
  initialVerified: number;
  initialNonVerified: number;

  runningTotal: number;
  runningVerified: number;
  runningNonVerified: number;

  lastCycleTotal: number;
  lastCycleVerified: number;
  lastCycleNonVerified: number;

  cycles: number;
  active: boolean;
}

export interface MentionCounts {
  total: number;
  verified: number;
  nonVerified: number;
}

// ============ MENTION TYPES ============

export interface MentionQuery {
  term: string;
  // Ask the provider to drop reposts; callers still dedup by id
  excludeReposts?: boolean;
}

export interface MentionRecord {
  id: string;
  author: string;
  authorVerified: boolean;
  text: string;
  timestamp: Date;
  likeCount: number;
  repostCount: number;
  replyCount: number;
  permalink: string;
}

// ============ RESULT TYPES ============

export type ProviderResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'failed'; reason: string };

export type DeliveryResult =
  | { ok: true }
  | { ok: false; reason: string };

export type BroadcastResult =
  | { status: 'sent' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

// ============ COLLABORATOR INTERFACES ============

export interface MentionSource {
  search(query: MentionQuery, limit: number): AsyncIterable<MentionRecord>;
}

export interface NotificationSink {
  send(channel: string, message: string): Promise<DeliveryResult>;
}

export interface RecordSink {
  append(token: string, sessionStart: number, records: MentionRecord[]): Promise<void>;
}
