export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(
      `Command "${command}" exited with ${exitCode ?? 'signal'}${
        stderr ? `: ${stderr.trim()}` : ''
      }`,
    );
    this.name = 'CommandFailedError';
  }
}
