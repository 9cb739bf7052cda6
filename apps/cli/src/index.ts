import { main } from './main.js';
import { readCliSettings } from './settings.js';

process.exitCode = await main(readCliSettings());
