/**
 * Prompt Port
 *
 * Line-oriented interactive input and text output, so the query console
 * can run against a terminal or a scripted session.
 */

/**
 * Reads one line of user input at a time.
 */
export interface Prompt {
  /**
   * Write the question and wait for the next input line.
   * Resolves to null once input has ended.
   */
  ask(question: string): Promise<string | null>;

  /**
   * Release the underlying input stream.
   */
  close(): void;
}

/**
 * Receives rendered text. Callers include their own newlines.
 */
export type OutputSink = (text: string) => void;
