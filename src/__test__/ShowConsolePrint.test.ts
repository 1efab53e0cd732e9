import { describeScanResult, getLocalVersion, showScanIssues } from '../show-console-print'
import { buildArena } from './helpers/arena'

afterEach(() => jest.restoreAllMocks())

it('reads the version from package.json', () => {
  expect(getLocalVersion()).toMatch(/^\d+\.\d+\.\d+/)
})

it('describes a scan result', () => {
  const arena = buildArena('/project', { 'a.txt': 100, sub: { 'b.txt': 300 } })
  expect(describeScanResult({ arena, issues: [], fileCount: 2, directoryCount: 2 })).toBe(
    '2 files, 2 directories, 400 B'
  )
})

it('prints nothing when every entry was read', () => {
  const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
  showScanIssues([])
  expect(log).not.toHaveBeenCalled()
})

it('caps the list of unreadable entries', () => {
  const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
  const issues = Array.from({ length: 25 }, (_, index) => ({
    path: `/locked/${index}`,
    code: 'EACCES',
    message: 'permission denied',
  }))

  showScanIssues(issues)

  // heading, 20 entries, the remainder line and a blank line
  expect(log).toHaveBeenCalledTimes(23)
  expect(log.mock.calls[21][0]).toContain('... and 5 more')
})
