import { MigrationManager } from './services/MigrationManager';
import { loadConfig, warnOnMissingCredentials } from './config';
import { describeError } from './lib/errors';
import { ImportReport } from './types';

type Env = Record<string, string | undefined>;

function usage(exportPath: string): string {
    return `Usage: trello-clubhouse-migrator <command>

Commands:
  export    Export the Trello board to ${exportPath}
  import    Import the exported cards into Clubhouse
  migrate   Export, then import
  check     Test the connection to every configured service`;
}

function exitCodeFor(report: ImportReport): number {
    return report.summary.failed > 0 ? 1 : 0;
}

async function dispatch(command: string | undefined, env: Env): Promise<number> {
    const config = loadConfig(env);
    warnOnMissingCredentials(config);
    const manager = new MigrationManager(config);

    switch (command) {
        case 'export':
            await manager.exportCards();
            return 0;
        case 'import':
            return exitCodeFor(await manager.importCards());
        case 'migrate':
            return exitCodeFor(await manager.migrate());
        case 'check':
            return (await manager.checkConnections()) ? 0 : 1;
        default:
            console.log(usage(config.exportPath));
            return command === undefined || command === '--help' ? 0 : 1;
    }
}

/**
 * Runs one command and resolves to the process exit code. Configuration
 * errors are reported like every other fatal error.
 */
export async function run(args: string[], env: Env = process.env): Promise<number> {
    try {
        return await dispatch(args[0], env);
    } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        return 1;
    }
}
