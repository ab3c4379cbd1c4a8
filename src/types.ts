// One inbound message as recorded in the dialogue log
export interface DialogueEntry {
  timestamp: number; // epoch ms
  userId: string;
  userName: string;
  message: string;
}

// Role of a turn in a user's rolling context
export type ContextRole = "user" | "assistant";

// One turn in a user's rolling context
export interface ContextEntry {
  role: ContextRole;
  text: string;
}

export type ReportKind = "hourly" | "daily";

// Half-open interval [start, end) summarized by one report
export interface ReportWindow {
  start: number; // epoch ms, inclusive
  end: number; // epoch ms, exclusive
  kind: ReportKind;
  // Bucket label used as the artifact key: "HH" for hourly, "YYYY-MM-DD" for daily
  label: string;
}

// Aggregated traffic for one window
export interface Report {
  window: ReportWindow;
  messageCount: number;
  uniqueUsers: number;
  topTerms: string[];
  highlightedMessages: string[];
}

// Last bucket each report kind was triggered for
export interface SchedulerState {
  lastHourlyBucket: string | null;
  lastDailyBucket: string | null;
  // Last calendar day re-aggregated after it fully elapsed
  lastSettledDay: string | null;
}
