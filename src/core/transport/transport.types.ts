/**
 * Raw retrieval of a fragment. Implementations fail with `NotFound` when the
 * location does not exist and `RetrievalFailed` for every other problem.
 */
export interface FragmentTransport {
  readonly schemes: readonly string[];
  read(uri: string): Promise<string>;
}
