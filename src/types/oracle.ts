/**
 * Boundary types of the extraction and intent oracles
 */

/**
 * One weekly timetable row as extracted from a document
 */
export interface TimetableEvent {
  summary: string;
  day: string;
  /** HH:MM */
  start_time: string;
  /** HH:MM */
  end_time: string;
  description: string;
}

export interface ExtractedTimetable {
  metadata: {
    semester: string;
    branch: string;
  };
  events: TimetableEvent[];
}

export interface IntentSuggestion {
  display: string;
  start_iso: string;
  end_iso: string;
}

export interface IntentResult {
  explanation: string;
  intent: {
    event_name: string;
    duration_minutes: number;
    target_semesters: string[];
  };
  suggestions: IntentSuggestion[];
}
