/**
 * Excuse email domain types.
 *
 * Request and response keep the snake_case field names the frontend sends.
 */

export interface ExcuseRequest {
  category: string;
  tone: string;
  /** 1 (light) to 5 (very serious) */
  seriousness: number;
  recipient_name: string;
  sender_name: string;
  eta_when: string;
}

export interface EmailDraft {
  subject: string;
  body: string;
}

export interface ExcuseResponse extends EmailDraft {
  success: boolean;
  /** Present only when success is false */
  error?: string;
}

/**
 * Anything that can turn a prompt into the model's raw reply text.
 * Failures are thrown as AppError subclasses.
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}
