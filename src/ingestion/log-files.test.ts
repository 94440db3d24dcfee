import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { DateTime } from 'luxon'
import { tmpdir } from 'os'
import { join } from 'path'

import { getEarliestFile, getFiles } from './log-files'

describe('log files', () => {
    const now = DateTime.utc(2018, 10, 10, 12)
    let dir: string

    const touch = (...segments: string[]): string => {
        const path = join(dir, ...segments)
        mkdirSync(join(path, '..'), { recursive: true })
        writeFileSync(path, '')
        return path
    }

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'pageviews-dir-'))
    })

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true })
    })

    it('predicts the path of the earliest file to consider', () => {
        expect(getEarliestFile('/dumps', 7, now)).toEqual('/dumps/2018/2018-10/pageviews-20181003-120000.gz')
    })

    it('lists recent log files, most recent first', async () => {
        touch('2018', '2018-09', 'pageviews-20180930-000000.gz')
        touch('2018', '2018-10', 'pageviews-20181003-110000.gz')
        const earliest = touch('2018', '2018-10', 'pageviews-20181003-120000.gz')
        const latest = touch('2018', '2018-10', 'pageviews-20181009-000000.gz')
        touch('2018', '2018-10', 'projectviews-20181009-000000')

        expect(await getFiles(dir, 7, now)).toEqual([latest, earliest])
    })
})
