import { writeFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { ERRORS, errorMessage, getDefaultConfig } from 'cache-manager-codegen';

export const CONFIG_FILE_NAME = '.cachemanagerrc.json';

interface InitOptions {
    force?: boolean;
    /** Directory to initialise; defaults to the working directory */
    cwd?: string;
    quiet?: boolean;
}

/** Returns the config path, or undefined when an existing file was kept */
export async function initCommand(options: InitOptions = {}): Promise<string | undefined> {
    const cwd = options.cwd ?? process.cwd();
    const configPath = resolve(cwd, CONFIG_FILE_NAME);
    const log = (line: string) => {
        if (!options.quiet) console.log(line);
    };

    log(chalk.blue('\n🔧 Cache manager init\n'));

    if (existsSync(configPath) && !options.force) {
        log(chalk.yellow(`⚠ ${CONFIG_FILE_NAME} already exists — use --force to overwrite.`));
        return undefined;
    }

    const spinner = ora({ text: `Writing ${CONFIG_FILE_NAME}...`, isSilent: options.quiet }).start();
    try {
        writeFileSync(configPath, `${JSON.stringify(getDefaultConfig(), null, 2)}\n`, 'utf-8');
        spinner.succeed(chalk.green(`Created ${CONFIG_FILE_NAME}`));
    } catch (err) {
        spinner.fail(`Failed to write ${CONFIG_FILE_NAME}`);
        throw ERRORS.WRITE_FAILED(configPath, errorMessage(err));
    }

    log(chalk.bold('\n✅ Ready!\n'));
    log('Next steps:');
    log(chalk.cyan('  1.') + ' Name the services to cache with the "Cache" suffix:');
    log(chalk.white('       service OrderCache { rpc GetOrder(OrderReq) returns (OrderResp); }'));
    log(chalk.cyan('  2.') + ' Run protoc with the plugin:');
    log(chalk.white('       protoc --plugin=protoc-gen-cache-manager --cache-manager_out=. order.proto'));
    log(chalk.cyan('  3.') + ' Or generate from a descriptor set:');
    log(chalk.white('       cache-manager generate order.binpb --out gen'));
    log('');

    return configPath;
}
