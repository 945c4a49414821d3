/**
 * Interactive prompt abstraction
 */

/**
 * Asks the user questions one at a time
 */
export interface Prompter {
  /**
   * Ask for a line of text. When the user enters nothing and a default is
   * given, the default is returned.
   */
  ask(message: string, defaultValue?: string): Promise<string>;

  /**
   * Ask a yes/no question
   */
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}
