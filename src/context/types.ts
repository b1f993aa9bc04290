/**
 * Context Types
 * Shared data model for fetching, synthesizing and persisting task context
 */

// =============================================================================
// SOURCES
// =============================================================================

export type SourceType =
  | 'issue_tracker'
  | 'meeting'
  | 'documentation'
  | 'communication'
  | 'email'
  | 'code'
  | 'cross_reference';

export interface Ticket {
  taskId: string;
  title: string;
  description: string | null;
  status: string;
  assignee: string | null;
  labels: string[];
  components: string[];
  acceptanceCriteria: string | null;
  storyPoints: number | null;
  sprint: string | null;
  created: Date;
  updated: Date;
}

export interface TicketComment {
  author: string;
  body: string;
  created: Date;
}

export interface LinkedIssue {
  taskId: string;
  title: string;
  status: string;
  linkType: string;
}

export interface MeetingExcerpt {
  meetingTitle: string;
  meetingDate: Date;
  participants: string[];
  excerpt: string;
  actionItems: string[];
  decisions: string[];
}

export type DocType = 'architecture' | 'standards' | 'adr' | 'other';

export interface DocSection {
  filePath: string;
  sectionTitle: string | null;
  content: string;
  docType: DocType;
}

export interface Message {
  id: string;
  channel: string;
  author: string;
  text: string;
  timestamp: Date;
  permalink: string | null;
}

export interface MessageThread {
  parent: Message;
  replies: Message[];
}

export interface EmailMessage {
  id: string;
  threadId: string;
  subject: string;
  sender: string;
  senderName: string | null;
  recipients: string[];
  date: Date;
  snippet: string;
  body: string;
}

export interface EmailThread {
  threadId: string;
  subject: string;
  messages: EmailMessage[];
  participants: string[];
  latestDate: Date;
}

export interface PullRequest {
  repo: string;
  number: number;
  title: string;
  author: string;
  state: string;
  url: string;
  mergedAt: Date | null;
  body: string | null;
  changedFiles: string[];
  /** Mentions the task, or a recent merge in the ticket's area */
  relation: 'mentions' | 'recent';
}

export interface CodeIssue {
  repo: string;
  number: number;
  title: string;
  state: string;
  url: string;
  labels: string[];
}

/**
 * Typed payload carried next to the synthesis-ready text
 */
export type SourcePayload =
  | { kind: 'ticket'; ticket: Ticket; comments: TicketComment[]; linkedIssues: LinkedIssue[] }
  | { kind: 'meetings'; meetings: MeetingExcerpt[] }
  | { kind: 'docs'; sections: DocSection[] }
  | { kind: 'messages'; threads: MessageThread[] }
  | { kind: 'emails'; threads: EmailThread[] }
  | { kind: 'code'; pullRequests: PullRequest[]; issues: CodeIssue[] };

export interface SourceContext {
  readonly sourceName: string;
  readonly sourceType: SourceType;
  readonly data?: SourcePayload;
  /** Synthesis-ready text; empty when the source failed */
  readonly rawText: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly fetchedAt: Date;
  readonly error?: string;
}

/** One entry per adapter, in adapter order */
export type FetchResult = SourceContext[];

export interface SearchResult {
  sourceName: string;
  sourceType: SourceType;
  title: string;
  excerpt: string;
  url: string | null;
  /** 0..1 */
  relevanceScore: number;
}

// =============================================================================
// QUALITY
// =============================================================================

export type GapKind =
  | 'missing_acceptance_criteria'
  | 'missing_components'
  | 'missing_labels'
  | 'missing_meetings'
  | 'missing_docs'
  | 'missing_linked_issues';

export interface Gap {
  kind: GapKind;
  description: string;
}

export interface TicketFields {
  acceptanceCriteria: string | null;
  components: string[];
  labels: string[];
  linkedIssues: string[];
}

export interface QualityResult {
  qualityScore: number;
  gaps: Gap[];
}

// =============================================================================
// RESULTS
// =============================================================================

export type ContextOrigin = 'prebuilt' | 'cache' | 'fresh';

export interface SynthesizedContext {
  taskId: string;
  body: string;
  sourcesUsed: string[];
  qualityScore: number;
  gaps: Gap[];
  builtAt: Date;
  origin: ContextOrigin;
}

export type PrebuiltStatus = 'active' | 'expired' | 'stale';

export interface PrebuiltRecord {
  taskId: string;
  body: string;
  sourcesUsed: string[];
  qualityScore: number;
  gaps: Gap[];
  /** sha256 over the normalized concatenation of all fetched raw text */
  sourceDataHash: string;
  /** Cheap version token of the primary source (e.g. ticket `updated`), if it has one */
  sourceVersion: string | null;
  createdAt: Date;
  expiresAt: Date;
  status: PrebuiltStatus;
}

export interface PrebuiltStats {
  total: number;
  active: number;
  expired: number;
  avgQuality: number;
  lastBuild: Date | null;
}
