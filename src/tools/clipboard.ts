import { spawn } from 'node:child_process';

type ClipboardCommand = { file: string; args: string[] };

export function clipboardCommands(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): ClipboardCommand[] {
  if (platform === 'darwin') return [{ file: 'pbcopy', args: [] }];
  if (platform === 'win32') return [{ file: 'clip', args: [] }];
  const cmds: ClipboardCommand[] = [];
  if (env.WAYLAND_DISPLAY) cmds.push({ file: 'wl-copy', args: [] });
  cmds.push({ file: 'xclip', args: ['-selection', 'clipboard'] });
  cmds.push({ file: 'xsel', args: ['--clipboard', '--input'] });
  return cmds;
}

function pipeTo(cmd: ClipboardCommand, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd.file, cmd.args, { stdio: ['pipe', 'ignore', 'ignore'] });
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`${cmd.file} exited with code ${code ?? 'null'}`));
    });
    child.stdin.on('error', reject);
    child.stdin.end(text);
  });
}

/** Put `text` on the system clipboard using the first helper that works. */
export async function copyToClipboard(text: string): Promise<void> {
  const failures: string[] = [];
  for (const cmd of clipboardCommands()) {
    try {
      await pipeTo(cmd, text);
      return;
    } catch (e: unknown) {
      failures.push(e instanceof Error ? e.message : String(e));
    }
  }
  throw new Error(`no clipboard helper available (${failures.join('; ')})`);
}
