// The slice of the global fetch the adapters use; tests pass a fake.
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
