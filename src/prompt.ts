/**
 * Operator interaction, injected so flows can run unattended in tests.
 */
export interface Prompter {
  /** Ask a yes/no question; an empty answer takes `defaultAnswer` */
  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;
  /** Block until the operator signals they are done */
  waitForOperator(message: string): Promise<void>;
  /** Release the input stream once no more questions will be asked */
  close(): void;
}
