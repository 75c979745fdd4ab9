import { displayVersion, displayError, readPackageInfo } from './cli-display';
import { display } from './display';

export { displayVersion, displayError, readPackageInfo, display };
