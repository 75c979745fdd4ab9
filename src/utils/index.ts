import { logger } from './logger';
import { display } from './cli/display';
import { spinner } from './spinner';
import { ConfigManager } from './config';
import { onInterrupt } from './interrupt';

export { logger, display, spinner, ConfigManager, onInterrupt };
