import type { Collidable } from '../entities/Entity.ts'

/**
 * One measured pair. `distance` is computed once and reused by every rule
 * that looks at this pair during the frame.
 */
export interface Contact<A extends Collidable, B extends Collidable> {
  a: A
  b: B
  distance: number
  overlapping: boolean
}

/**
 * Measure a pair. Overlap is strict: touching circles do not collide, and
 * inactive entities never overlap.
 */
export function measure<A extends Collidable, B extends Collidable>(a: A, b: B): Contact<A, B> {
  const distance = a.getPosition().distanceTo(b.getPosition())
  const overlapping =
    a.isActive() &&
    b.isActive() &&
    distance < a.getCollisionRadius() + b.getCollisionRadius()
  return { a, b, distance, overlapping }
}

/**
 * Collision detection for the controller's collision phase
 */
export class CollisionSystem {
  /**
   * Measure a single pair
   */
  checkPair<A extends Collidable, B extends Collidable>(a: A, b: B): Contact<A, B> {
    return measure(a, b)
  }

  /**
   * Walk `group` in order, measuring each member against `target` once.
   * The target is re-read for every member, so a handler that moves it
   * (a respawn) is seen by the members after it.
   * Returns the number of overlaps handled.
   */
  resolveGroup<A extends Collidable, B extends Collidable>(
    group: readonly A[],
    target: B,
    onOverlap: (contact: Contact<A, B>) => void
  ): number {
    let handled = 0
    for (const member of group) {
      const contact = measure(member, target)
      if (contact.overlapping) {
        onOverlap(contact)
        handled++
      }
    }
    return handled
  }
}
