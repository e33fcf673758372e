import { configureLogging, silentSink } from '@/lib/log';

configureLogging({ level: 'debug', sink: silentSink });
