/**
 * Storage-facing contract shared by repositories: domain models in,
 * domain models out, with no Drizzle types crossing the boundary.
 */
export interface Repository<T, CreateInput> {
  /** Null when nothing has that id. */
  findById(id: string): Promise<T | null>;

  findAll(): Promise<T[]>;

  /** Persists the input and returns it with generated ids filled in. */
  create(input: CreateInput): Promise<T>;

  /** Throws when no entity has that id. */
  delete(id: string): Promise<void>;
}
