export class CommandAliasRegistry {
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(aliases: Readonly<Record<string, string>>) {
    this.aliases = new Map(Object.entries(aliases));
  }

  resolve(alias: string): string | undefined {
    return this.aliases.get(alias);
  }
}
