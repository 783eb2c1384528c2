import { createPackageLogger } from '@stratlab/utils';

export const logger = createPackageLogger('@stratlab/jobs');
