/**
 * Config Command
 * 設定檔指令 - 產生預設設定檔、顯示有效設定
 */

import { Command } from 'commander';
import { ConfigService, defaultConfig, saveConfig } from '../services/config.js';

export const configCommand = new Command('config').description('Manage configuration files');

/**
 * token-gateway config init <path>
 */
configCommand
  .command('init <path>')
  .description('Write the default configuration to a file')
  .action((targetPath: string) => {
    try {
      saveConfig(defaultConfig(), targetPath);
      console.log(`✅ Configuration written to ${targetPath}`);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to write configuration: ${errorMsg}`);
      process.exit(1);
    }
  });

/**
 * token-gateway config show [--config <path>]
 * 密碼與 token 以 *** 遮蔽
 */
configCommand
  .command('show')
  .description('Print the effective configuration (file + environment)')
  .option('-c, --config <path>', 'Path to config file')
  .action((options: { config?: string }) => {
    try {
      const config = new ConfigService(options.config).getAll();
      if (config.nats.password) config.nats.password = '***';
      if (config.nats.token) config.nats.token = '***';
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to load configuration: ${errorMsg}`);
      process.exit(1);
    }
  });
