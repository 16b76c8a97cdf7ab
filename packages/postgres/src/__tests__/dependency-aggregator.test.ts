import { describe, it, expect } from 'vitest'
import { dependencyWindow, groupDependencyLinks } from '../query/dependency-aggregator.js'

describe('groupDependencyLinks', () => {
  it('returns no links for no edges', () => {
    expect(groupDependencyLinks([])).toEqual([])
  })

  it('counts edges per parent and child service pair', () => {
    const links = groupDependencyLinks([
      { parentId: 1, parent: 'frontend', childId: 2, child: 'backend' },
      { parentId: 1, parent: 'frontend', childId: 2, child: 'backend' },
      { parentId: 1, parent: 'frontend', childId: 3, child: 'cache' },
      { parentId: 2, parent: 'backend', childId: 4, child: 'db' },
    ])

    expect(links).toEqual([
      { parentId: 1, parent: 'frontend', childId: 2, child: 'backend', callCount: 2 },
      { parentId: 1, parent: 'frontend', childId: 3, child: 'cache', callCount: 1 },
      { parentId: 2, parent: 'backend', childId: 4, child: 'db', callCount: 1 },
    ])
  })

  it('keeps direction: a to b and b to a are separate links', () => {
    const links = groupDependencyLinks([
      { parentId: 1, parent: 'a', childId: 2, child: 'b' },
      { parentId: 2, parent: 'b', childId: 1, child: 'a' },
    ])

    expect(links.map((link) => `${link.parent}->${link.child}`)).toEqual(['a->b', 'b->a'])
  })

  it('orders links by first appearance', () => {
    const links = groupDependencyLinks([
      { parentId: 5, parent: 'z', childId: 6, child: 'y' },
      { parentId: 1, parent: 'a', childId: 2, child: 'b' },
      { parentId: 5, parent: 'z', childId: 6, child: 'y' },
    ])

    expect(links.map((link) => link.parent)).toEqual(['z', 'a'])
    expect(links[0].callCount).toBe(2)
  })
})

describe('dependencyWindow', () => {
  it('ends at endTime and starts lookback milliseconds earlier', () => {
    const end = new Date('2024-03-01T12:00:00.000Z')

    const window = dependencyWindow(end, 60 * 60 * 1000)

    expect(window.start.toISOString()).toBe('2024-03-01T11:00:00.000Z')
    expect(window.end).toBe(end)
  })
})
