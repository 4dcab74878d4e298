import { once } from 'node:events';
import { execa } from 'execa';

export type LaunchOptions = {
  shell: boolean;
};

/**
 * Starts a program without waiting for it to finish.
 * Resolves once the process has spawned, rejects if it could not be started.
 */
export type Launcher = (file: string, args: string[], options: LaunchOptions) => Promise<void>;

/**
 * Launch a detached process with execa
 */
export const execaLauncher: Launcher = async (file, args, { shell }) => {
  const subprocess = execa(file, args, {
    shell,
    detached: true,
    cleanup: false,
    stdio: 'ignore',
    // The exit status is not ours to judge once the program is running
    reject: false,
  });
  subprocess.unref();
  await once(subprocess, 'spawn');
};

/**
 * Program and arguments that open a file or URL with the OS default handler
 */
export function defaultOpenCommand(
  payload: string,
  platform: NodeJS.Platform = process.platform,
): { file: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { file: 'open', args: [payload] };
    case 'win32':
    case 'cygwin':
      // `start` reads a first quoted argument as the window title, hence the empty one
      return { file: 'cmd', args: ['/c', 'start', '', payload] };
    default:
      return { file: 'xdg-open', args: [payload] };
  }
}
