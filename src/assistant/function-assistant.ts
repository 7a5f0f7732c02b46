/** Something that can read a function's code and say things about it */
export interface FunctionAssistant {
  /**
   * A better name for the function, without any prefix. Undefined when the
   * function is too big to ask about.
   */
  suggestName(name: string, code: string): Promise<string | undefined>;
  /**
   * The function's code with comments added. Undefined when the function is
   * too big to ask about.
   */
  addComments(name: string, code: string): Promise<string | undefined>;
}
