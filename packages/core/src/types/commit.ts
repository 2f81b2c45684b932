/**
 * Outcome of staging and committing the store after a mutation.
 * A failed commit never undoes the mutation that preceded it.
 */
export type CommitResult =
	| { readonly committed: true; readonly message: string }
	| { readonly committed: false; readonly message: string; readonly reason: string };
