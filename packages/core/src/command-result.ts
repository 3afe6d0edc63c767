export interface CommandError {
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface CommandResultSuccess {
  readonly success: true;
}

export interface CommandResultFailure {
  readonly success: false;
  readonly error: CommandError;
}

export type CommandResult = CommandResultSuccess | CommandResultFailure;

export const COMMAND_SUCCESS: CommandResultSuccess = Object.freeze({ success: true });

export function commandFailure(
  code: string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): CommandResultFailure {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
  };
}
