import { setLogLevel } from '@battrack/shared-utils';

setLogLevel('error');
