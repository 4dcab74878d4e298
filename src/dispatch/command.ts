import type { CommandSpec } from '../config/resolved-config.types.js';
import { DispatchError, describeError } from '../errors/custom-errors.js';
import type { Logger } from '../utils/logger.js';
import { defaultOpenCommand, type Launcher } from './launcher.js';

/**
 * Token replaced with the torrent path or URL in command arguments
 */
export const COMMAND_PAYLOAD_PLACEHOLDER = '$PATH_OR_URL';

/**
 * Replace every occurrence of the placeholder, literally, in each argument
 */
export function substituteArguments(args: readonly string[], payload: string): string[] {
  return args.map((arg) => arg.split(COMMAND_PAYLOAD_PLACEHOLDER).join(payload));
}

/**
 * Dispatch action: hands a downloaded torrent path or a torrent URL to
 * another program, or to the OS default handler when no program is set.
 */
export class Command {
  readonly arguments?: readonly string[];
  readonly shell: boolean;

  constructor(
    spec: CommandSpec,
    private readonly launcher: Launcher,
    private readonly logger: Logger,
  ) {
    this.arguments = spec.arguments;
    this.shell = spec.shell;
  }

  /**
   * @throws DispatchError if the program could not be started
   */
  async run(payload: string): Promise<void> {
    const [file, ...args] = this.arguments ? substituteArguments(this.arguments, payload) : [];
    const launch = file !== undefined ? { file, args } : defaultOpenCommand(payload);

    if (file !== undefined) {
      this.logger.info(`Launching ${JSON.stringify([launch.file, ...launch.args])}${this.shell ? ' in shell' : ''}`);
    } else {
      this.logger.info(`Opening ${JSON.stringify(payload)} with the default program`);
    }

    try {
      await this.launcher(launch.file, launch.args, { shell: file !== undefined && this.shell });
    } catch (error) {
      throw new DispatchError(`Failed to launch "${launch.file}": ${describeError(error)}`, payload, { cause: error });
    }
  }

  toString(): string {
    return this.arguments ? JSON.stringify(this.arguments) : '<default program>';
  }
}
