import { initLogger, LogLevel } from '@git-onboard/core';

initLogger({ level: LogLevel.ERROR, logToFile: false, silent: true });
