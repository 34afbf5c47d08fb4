import { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getApiConfig(): Config["api"];
  getRunConfig(): Config["run"];
  getStorageConfig(): Config["storage"];
  getLoggingConfig(): Config["logging"];
}
