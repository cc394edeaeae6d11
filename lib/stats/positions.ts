import { StatsError } from './errors'
import { POSITIONS, TOUCHDOWN_CATEGORIES, type Position, type StatRecord, type TouchdownCategory } from './types'

/** Roster codes counted toward each position group */
export const POSITION_GROUPS: Record<Position, readonly string[]> = {
  QB: ['QB'],
  RB: ['RB', 'FB'],
  WR: ['WR'],
  TE: ['TE'],
}

const CATEGORIES_BY_POSITION: Record<Position, readonly TouchdownCategory[]> = {
  QB: ['passing', 'rushing', 'total'],
  RB: ['rushing', 'receiving', 'total'],
  WR: ['rushing', 'receiving', 'total'],
  TE: ['rushing', 'receiving', 'total'],
}

export function isPosition(value: string): value is Position {
  return (POSITIONS as readonly string[]).includes(value)
}

export function isTouchdownCategory(value: string): value is TouchdownCategory {
  return (TOUCHDOWN_CATEGORIES as readonly string[]).includes(value)
}

export function assertPosition(value: string): Position {
  if (!isPosition(value)) {
    throw new StatsError('INVALID_POSITION', `Position must be one of ${POSITIONS.join(', ')} (got "${value}")`, {
      details: { position: value },
    })
  }
  return value
}

export function categoriesFor(position: Position): readonly TouchdownCategory[] {
  return CATEGORIES_BY_POSITION[position]
}

export function assertCategory(position: Position, value: string): TouchdownCategory {
  if (!isTouchdownCategory(value) || !CATEGORIES_BY_POSITION[position].includes(value)) {
    throw new StatsError(
      'INVALID_CATEGORY',
      `Category "${value}" is not tracked for ${position} (expected ${CATEGORIES_BY_POSITION[position].join(', ')})`,
      { details: { position, category: value } }
    )
  }
  return value
}

export function inPositionGroup(record: StatRecord, position: Position): boolean {
  return POSITION_GROUPS[position].includes(record.position)
}

/** Every touchdown on the stat line, whatever the roster position */
export function allTouchdowns(record: StatRecord): number {
  return record.passingTds + record.rushingTds + record.receivingTds
}

/**
 * Touchdowns a player is credited with in a category. 'total' covers the
 * categories the position tracks: passing + rushing for QB, rushing + receiving
 * for everyone else, so a receiver's trick-play pass is left out.
 */
export function touchdownsFor(record: StatRecord, category: TouchdownCategory, position: Position): number {
  switch (category) {
    case 'passing':
      return record.passingTds
    case 'rushing':
      return record.rushingTds
    case 'receiving':
      return record.receivingTds
    case 'total':
      return position === 'QB' ? record.passingTds + record.rushingTds : record.rushingTds + record.receivingTds
  }
}

/** Passing + rushing + receiving yards */
export function totalYards(record: StatRecord): number {
  return record.passingYards + record.rushingYards + record.receivingYards
}

/** Ordinal comparison so tie-breaks don't depend on the runtime locale */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
