/** Asks the user a yes/no question; resolves true to proceed. */
export type ConfirmFn = (message: string) => Promise<boolean>;
