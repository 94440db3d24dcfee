import { KnownDatabases } from './known-databases'
import { candidateDatabase, ProjectDatabaseMapper } from './project-database'

describe('candidateDatabase', () => {
    it.each<[string, string | null]>([
        ['en', 'enwiki'],
        ['en.m', 'enwiki'],
        ['en.zero', 'enwiki'],
        ['de.d', 'dewiktionary'],
        ['de.m.d', 'dewiktionary'],
        ['fr.voy', 'frwikivoyage'],
        ['commons.m', 'commonswiki'],
        ['www.wd', 'wikidatawiki'],
        ['m.wd', 'wikidatawiki'],
        ['www.w', 'mediawikiwiki'],
        ['www.s', 'sourceswiki'],
        ['dk.m', 'dkwikimedia'],
        ['nyc.m.m', 'nycwikimedia'],
        ['be-tarask', 'be_x_oldwiki'],
        ['zh-min-nan.d', 'zh_min_nanwiktionary'],
        ['en.unknown', null],
    ])('maps %s to %s', (project, expected) => {
        expect(candidateDatabase(project)).toBe(expected)
    })
})

describe('ProjectDatabaseMapper', () => {
    it('only returns databases that are known', () => {
        const mapper = new ProjectDatabaseMapper(KnownDatabases.fromNames(['enwiki', 'wikidatawiki']))

        expect(mapper.databaseFromProjectName('en.m')).toBe('enwiki')
        expect(mapper.databaseFromProjectName('www.wd')).toBe('wikidatawiki')
        expect(mapper.databaseFromProjectName('xx')).toBeNull()
        expect(mapper.databaseFromProjectName('en.unknown')).toBeNull()
    })
})
