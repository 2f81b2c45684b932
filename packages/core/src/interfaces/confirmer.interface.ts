/** Answers a yes/no question. A `false` answer aborts the operation without side effects. */
export type IConfirmer = (message: string) => Promise<boolean>;
