/**
 * State shared by all methods decompiled in one run
 */

export class DecompileRun {
  private readonly baseTypeChains = new Map<string, readonly string[]>();

  /**
   * Full names of a type's non-interface base types, computed once per run.
   */
  baseTypesOf(typeFullName: string, compute: () => readonly string[]): readonly string[] {
    const cached = this.baseTypeChains.get(typeFullName);
    if (cached) return cached;
    const chain = compute();
    this.baseTypeChains.set(typeFullName, chain);
    return chain;
  }
}
