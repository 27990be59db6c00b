import { AppConfig, config } from '../config';
import { DISCORD_API_VERSION, DISCORD_SERVER_URL } from '../constants';

/**
 * Discord URL helpers
 */
export class DiscordHelper {
  private readonly appConfig: AppConfig;

  constructor(appConfig: AppConfig = config) {
    this.appConfig = appConfig;
  }

  /**
   * Get Discord server URL without a trailing slash
   */
  getServer(): string {
    const server = this.appConfig.discord.server || DISCORD_SERVER_URL;
    return server.endsWith('/') ? server.slice(0, -1) : server;
  }

  /**
   * Get the versioned REST API base URL
   */
  getApiBase(): string {
    const version = this.appConfig.discord.apiVersion || DISCORD_API_VERSION;
    return `${this.getServer()}/api/v${version}`;
  }
}
