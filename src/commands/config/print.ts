import { Config } from '../../config.js';
import { loadEnvVariables } from '../../utils/envUtils.js';

export async function configPrint() {
    await loadEnvVariables();
    const config = Config.fromEnv();
    console.log(config.serialize());
}
