/**
 * Line-oriented user interaction used by the confirmation gate, plan selection and the REPL.
 */
export interface Prompter {
	/** Ask for one line. Resolves `undefined` on EOF or interrupt. */
	ask(question: string, signal?: AbortSignal): Promise<string | undefined>;
	/** Write a block of text to the user. */
	print(text: string): void;
}
