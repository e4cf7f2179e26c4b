export class SchemaStructuralError extends Error {
  constructor(
    public readonly service: string,
    public readonly errors: string[],
    public readonly warnings: string[] = [],
  ) {
    super(`Schema validation failed: ${errors.join(', ')}`)
    this.name = 'SchemaStructuralError'
  }
}
