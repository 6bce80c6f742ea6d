export interface PromptSet {
  id: string;
  createdAt: string;
  /** Source file the prompts were generated from */
  sourceFileRef: string;
  /** Name of the generation function applied to the source file */
  promptFuncName: string;
  promptCount: number;
}

/** A prompt set together with its prompt texts, indexed 0..promptCount-1 */
export interface PromptSetContents extends PromptSet {
  prompts: string[];
}
