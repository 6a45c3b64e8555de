export interface IdentifierResolver {
  /** Returns the external identifier for an already-normalized title, or undefined when nothing matches. */
  resolve(cleanedTitle: string): Promise<string | undefined>;
}
