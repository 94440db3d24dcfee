import { defaultConfig } from './config/config'
import { runPageviewsJob } from './main/pageviews-runner'
import { logger, shutdownLogger } from './utils/logger'

runPageviewsJob(defaultConfig)
    .catch((error: unknown) => {
        logger.error('💥', 'Pageviews job failed', { error })
        process.exitCode = 1
    })
    .finally(() => shutdownLogger())
