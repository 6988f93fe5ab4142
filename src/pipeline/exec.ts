import { execa, ExecaError } from 'execa';
import { CommandError } from './errors';
import { debug } from './log';

export interface CommandResult {
    stdout: string;
}

/** Spawns `cmd args` and resolves with its stdout; rejects with CommandError. */
export type CommandRunner = (cmd: string, args: string[]) => Promise<CommandResult>;

const STDERR_TAIL = 800;

export const runCommand: CommandRunner = async (cmd, args) => {
    debug('exec.start', { cmd, args });
    try {
        const res = await execa(cmd, args, { stdio: 'pipe' });
        return { stdout: res.stdout };
    } catch (e) {
        if (e instanceof ExecaError) {
            const stderr = typeof e.stderr === 'string' ? e.stderr : '';
            throw new CommandError(e.shortMessage, cmd, {
                exitCode: e.exitCode,
                errno: e.code,
                stderr: stderr.slice(-STDERR_TAIL),
            });
        }
        throw e;
    }
};

/** Runs the first candidate that succeeds; collects every failure otherwise. */
export async function runFirstAvailable(
    candidates: Array<[string, string[]]>,
    run: CommandRunner = runCommand
): Promise<CommandResult & { cmd: string }> {
    const errors: string[] = [];
    for (const [cmd, args] of candidates) {
        try {
            const res = await run(cmd, args);
            return { ...res, cmd };
        } catch (e) {
            const msg =
                e instanceof CommandError
                    ? e.stderr || e.message
                    : e instanceof Error
                      ? e.message
                      : String(e);
            errors.push(`[${cmd}] ${msg}`);
        }
    }
    throw new CommandError(
        `All attempts failed. Tried: ${candidates.map(([c]) => c).join(', ')}\nErrors:\n${errors.join('\n---\n')}`,
        candidates.map(([c]) => c).join('|')
    );
}
