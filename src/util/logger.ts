import pino from 'pino';
import env from './env';

import { jobLogFields } from './context';

const logger = pino({
    level: env.LOG_LEVEL,
    mixin: jobLogFields,
    // Worker-thread transports keep Jest alive after the run
    transport: env.NODE_ENV === 'test' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,job,minute',
            messageFormat: '{if job}[{job}] {end}{msg}'
        }
    }
});

export default logger;
