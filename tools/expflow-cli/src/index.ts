import dotenv from 'dotenv';
import { setLogLevel } from '@expflow/experiment-config';
import { createProgram } from './program.js';

dotenv.config();

// The logger read the environment before .env was loaded
if (process.env.EXPFLOW_LOG_LEVEL) {
    setLogLevel(process.env.EXPFLOW_LOG_LEVEL);
}

createProgram().parse();
