/**
 * Outcome of a workflow step. Expected business failures (wrong status,
 * no seats, undeclared result) come back as `success: false` rather than
 * as exceptions; callers must check the flag.
 */
export interface WorkflowResult {
  success: boolean;
  message: string;
}

export const succeed = (message: string): WorkflowResult => ({ success: true, message });
export const fail = (message: string): WorkflowResult => ({ success: false, message });
