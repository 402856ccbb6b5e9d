export interface HealerCliOptions {
  maxAttempts?: number;
  timeoutSeconds?: number;
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'heal'; testFile: string; options: HealerCliOptions };
