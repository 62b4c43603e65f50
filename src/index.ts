import 'dotenv/config';
import { loadSettings } from './config/settings.js';
import { createApp } from './app.js';
import { IndexTrackerService, YahooFinancePriceSource } from './services/index.js';
import { logger, setLogLevel } from './utils/logger.js';

async function main() {
    try {
        const settings = loadSettings();
        setLogLevel(settings.logLevel);

        const priceSource = new YahooFinancePriceSource({
            baseUrl: settings.priceFetch.sourceUrl,
            exchangeSuffix: settings.priceFetch.exchangeSuffix
        });
        const tracker = new IndexTrackerService(settings, { priceSource });
        const app = createApp(tracker);

        app.listen(settings.port, () => {
            logger.info(`Index tracker API running at http://localhost:${settings.port}/api`);
            logger.info(`Universe file: ${settings.securitiesFile}`);
        });
    } catch (error) {
        logger.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
