/**
 * Massing Preview Service
 * Main entry point
 */

import 'dotenv/config';
import { startServer } from './server.js';

startServer();
