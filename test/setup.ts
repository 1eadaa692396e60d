import { Logger } from '@nestjs/common';

// keep service logs out of the test output
Logger.overrideLogger(false);
