export function printJson(value: unknown, write: (text: string) => void = (text) => process.stdout.write(text)): void {
  write(`${JSON.stringify(value, null, 2)}\n`);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function formatCommandError(mode: string, error: unknown, asJson: boolean): string {
  const message = toErrorMessage(error);

  if (asJson) {
    return JSON.stringify(
      {
        mode,
        ok: false,
        error: {
          message
        }
      },
      null,
      2
    );
  }

  return message;
}

export function printCommandError(mode: string, error: unknown, asJson: boolean): void {
  process.stderr.write(`${formatCommandError(mode, error, asJson)}\n`);
}
