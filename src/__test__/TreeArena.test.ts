import { MIN_WEIGHT, TreeArena } from '../tree-arena'
import { buildArena, idOf } from './helpers/arena'

function projectArena() {
  return buildArena('/project', { 'a.txt': 100, sub: { 'b.txt': 300 } })
}

describe('TreeArena', () => {
  it('gives the root id 0 and keeps only the root opened', () => {
    const arena = projectArena()
    expect(arena.rootId).toBe(0)
    expect(arena.get(0).expanded).toBe(true)
    expect(arena.get(idOf(arena, '/project/sub')).expanded).toBe(false)
    expect(arena.get(idOf(arena, '/project/a.txt')).expanded).toBe(false)
  })

  it('links children and parents by id', () => {
    const arena = projectArena()
    const sub = idOf(arena, '/project/sub')
    const b = idOf(arena, '/project/sub/b.txt')
    expect(arena.get(0).children).toEqual([idOf(arena, '/project/a.txt'), sub])
    expect(arena.get(b).parent).toBe(sub)
    expect(arena.ancestors(b)).toEqual([0, sub])
    expect(arena.depth(b)).toBe(2)
    expect(arena.depth(0)).toBe(0)
  })

  it('lists descendants depth first', () => {
    const arena = projectArena()
    expect(arena.descendants(0)).toEqual([1, 2, 3])
    expect(arena.descendants(1)).toEqual([])
  })

  it('shows the children of the root as the visible blocks', () => {
    const arena = projectArena()
    expect(arena.visibleNodes()).toEqual([1, 2])
    arena.get(2).expanded = true
    expect(arena.visibleNodes()).toEqual([1, 3])
  })

  it('shows the root itself when it has no children', () => {
    const arena = buildArena('/empty', {})
    expect(arena.visibleNodes()).toEqual([0])
  })

  it('never weighs a node below the minimum', () => {
    const arena = buildArena('/project', { 'empty.txt': 0, 'a.txt': 10 })
    expect(arena.effectiveWeight(1)).toBe(MIN_WEIGHT)
    expect(arena.effectiveWeight(2)).toBe(10)
    arena.get(2).visualWeight = 30
    expect(arena.effectiveWeight(2)).toBe(30)
    expect(arena.get(2).size).toBe(10)
  })

  it('computes the share of a node among its siblings', () => {
    const arena = projectArena()
    expect(arena.visualShare(1)).toBe(0.25)
    expect(arena.visualShare(2)).toBe(0.75)
    expect(arena.visualShare(0)).toBe(1)
  })

  it('builds path strings with a kind suffix', () => {
    const arena = projectArena()
    expect(arena.getPathString(1)).toBe('/project/a.txt (file)')
    expect(arena.getPathString(2)).toBe('/project/sub (folder)')
  })

  it('rejects unknown ids and a second root', () => {
    const arena = projectArena()
    expect(() => arena.get(99)).toThrow(RangeError)
    expect(arena.has(99)).toBe(false)
    expect(arena.has(3)).toBe(true)
    expect(() => arena.add({ name: 'other', path: '/other', kind: 'directory' })).toThrow(
      'The tree already has a root.'
    )
  })

  it('refuses children under a file', () => {
    const arena = projectArena()
    expect(() =>
      arena.add({ name: 'x', path: '/project/a.txt/x', kind: 'file' }, 1)
    ).toThrow("Can't add 'x' under file '/project/a.txt'.")
  })

  it('has no root before the first node is added', () => {
    expect(() => new TreeArena().rootId).toThrow(RangeError)
  })
})
