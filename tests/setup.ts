import { configureLogger } from '@/utils/logger';

configureLogger('fatal');
