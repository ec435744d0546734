import { randomBytes } from 'crypto';
import { CONFIG } from '../config/constants';
import type { DeployConfig } from '../config/app';
import { runCommand, type CommandRunner } from '../utils/command';
import { getLogger, type Logger } from '../utils/simple-logger';

export interface RedeployerOptions {
  config: DeployConfig;
  runner?: CommandRunner;
  nonce?: () => string;
  logger?: Logger;
}

export const buildRedeployArgs = (service: string, config: DeployConfig, nonce: string): string[] => {
  const args = ['run', 'services', 'update', service, '--update-env-vars', `${config.envVar}=${nonce}`];
  if (config.region) {
    args.push('--region', config.region);
  }
  if (config.project) {
    args.push('--project', config.project);
  }
  args.push('--quiet');
  return args;
};

/**
 * Forces a new revision of a container service by writing a fresh random
 * value into one of its environment variables. The next request is then
 * served by a newly started instance.
 */
export class Redeployer {
  private readonly config: DeployConfig;
  private readonly runner: CommandRunner;
  private readonly nonce: () => string;
  private readonly logger: Logger;

  constructor(options: RedeployerOptions) {
    this.config = options.config;
    this.runner = options.runner ?? runCommand;
    this.nonce = options.nonce ?? (() => randomBytes(8).toString('hex'));
    this.logger = options.logger ?? getLogger('redeployer', 'Redeployer');
  }

  async redeploy(service: string): Promise<string> {
    const nonce = this.nonce();
    const args = buildRedeployArgs(service, this.config, nonce);

    this.logger.info('Redeploying service', { service, envVar: this.config.envVar });
    await this.runner(CONFIG.DEPLOY.CLI, args);
    this.logger.info('Service redeployed', { service });

    return nonce;
  }
}
