// ============================================================================
// RECORD MODEL
// ============================================================================

export interface Author {
  id: string;
  name: string;
  url: string;
}

export type AttachmentType = 'image' | 'video' | 'link';

export interface Attachment {
  type: AttachmentType;
  url: string;
  alt?: string;
  text?: string;
}

export interface Comment {
  text: string;
  createdAt: number;
  author: Author;
  reactionCount: number;
  commentCount: number;
}

export interface Post {
  createdAt: number;
  url: string;
  user: Author;
  text: string;
  attachments: Attachment[];
  reactionCount: number;
  shareCount: number;
  commentCount: number;
  topComments: Comment[];
}

export type EmissionKind = 'created' | 'updated';

export interface PostEmission {
  kind: EmissionKind;
  post: Post;
}

// ============================================================================
// SESSION BOUNDARY
// ============================================================================

// Supplied by session management; forwarded as-is, never refreshed here.
export interface SessionContext {
  cookie: string;
  userAgent?: string;
}

export interface ProxyDescriptor {
  server: string;
  username?: string;
  password?: string;
}

// ============================================================================
// FETCHING
// ============================================================================

export type FeedPayload =
  | { format: 'json'; data: unknown }
  | { format: 'html'; html: string };

export interface RawPage {
  url: string;
  status: number;
  payload: FeedPayload;
  nextCursorHint: string | null;
}

export type FetchFailureKind = 'RateLimited' | 'AuthExpired' | 'NotFound' | 'Transient' | 'Malformed';

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  status?: number;
  retryAfterMs?: number;
}

export type PageResult =
  | { ok: true; page: RawPage }
  | { ok: false; failure: FetchFailure };

// ============================================================================
// PARSING
// ============================================================================

export interface ParseResult {
  posts: Post[];
  partial: boolean;
  defects: string[];
}

// ============================================================================
// PAGINATION
// ============================================================================

export interface Cursor {
  groupUrl: string;
  token: string | null;
  pagesConsumed: number;
  emptyStreak: number;
  staleStreak: number;
}

export type TerminalReason =
  | 'EndOfFeed'
  | 'CursorStall'
  | 'EmptyStreak'
  | 'StaleStreak'
  | 'MaxPages'
  | 'MaxPosts'
  | 'AuthExpired'
  | 'NotFound'
  | 'RetryBudgetExhausted'
  | 'Cancelled';

export interface Terminal {
  terminal: true;
  reason: TerminalReason;
  cursor: Cursor;
}

export interface PageObservation {
  candidates: number;
  newIdentities: number;
}

// ============================================================================
// RUN SUMMARY
// ============================================================================

export type FailureKind = FetchFailureKind | 'ParseError' | 'RetryBudgetExhausted' | 'CursorStall';

export interface FailureRecord {
  kind: FailureKind;
  page: number;
  message: string;
}

export interface RunSummary {
  groupUrl: string;
  pagesFetched: number;
  postsEmitted: number;
  updatesEmitted: number;
  partialPages: number;
  terminalReason: TerminalReason | null;
  failures: FailureRecord[];
  cursor: Cursor;
  startedAt: string;
  completedAt: string | null;
}
