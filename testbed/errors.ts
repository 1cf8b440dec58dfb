export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

export class CommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly code: number | null,
    public readonly stderr: string
  ) {
    const detail = stderr.trim();
    super(`Command failed with code ${code}: ${command}${detail ? `\n${detail}` : ''}`);
    this.name = 'CommandError';
  }
}

export class RemoteError extends Error {
  constructor(public readonly host: string, message: string, options?: { cause?: unknown }) {
    super(`${host}: ${message}`, options);
    this.name = 'RemoteError';
  }
}

export class PipelineError extends Error {
  constructor(public readonly stage: string, message: string, options?: { cause?: unknown }) {
    super(`${stage}: ${message}`, options);
    this.name = 'PipelineError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
