import type { MappingStore } from "../domain/MappingStore.js";
import { CommandAliasRegistry } from "../infrastructure/CommandAliasRegistry.js";
import { MalformedMappingError, UnknownCommandError } from "./errors.js";

export interface ExecutionPlan {
  program: string;
  args: string[];
}

/**
 * Resolves one semantic invocation against a loaded store. Path aliases are
 * substituted per argument on whole-string matches only; the store is never
 * modified.
 */
export function translate(store: MappingStore, aliasToken: string, trailingArgs: readonly string[]): ExecutionPlan {
  const commands = new CommandAliasRegistry(store.commandMap);
  const paths = new CommandAliasRegistry(store.pathMap);

  const realCommand = commands.resolve(aliasToken);
  if (realCommand === undefined) {
    throw new UnknownCommandError(aliasToken);
  }

  const [program, ...fixedArgs] = splitCommand(realCommand);
  if (!program) {
    throw new MalformedMappingError(aliasToken);
  }

  const substituted = trailingArgs.map(arg => paths.resolve(arg) ?? arg);
  return { program, args: [...fixedArgs, ...substituted] };
}

export function splitCommand(command: string): string[] {
  const trimmed = command.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function formatPlan(plan: ExecutionPlan): string {
  return [plan.program, ...plan.args].map(quoteArg).join(" ");
}

function quoteArg(value: string) {
  if (value && !/[\s'"\\$`]/.test(value)) return value;
  return `'${value.replace(/'/g, "'\\''")}'`;
}
