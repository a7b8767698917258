/**
 * Every session name handed to the target is registered here before the create call goes out, so
 * the final sweep covers names from scenarios that crashed half way.
 */
export class CleanupRegistry {
  private readonly registered = new Set<string>()

  register(name: string): void {
    this.registered.add(name)
  }

  registerAll(names: Iterable<string>): void {
    for (const name of names) {
      this.registered.add(name)
    }
  }

  has(name: string): boolean {
    return this.registered.has(name)
  }

  names(): string[] {
    return [...this.registered]
  }

  get size(): number {
    return this.registered.size
  }
}
