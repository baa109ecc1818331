/**
 * Magnitudes below this are treated as zero when normalizing.
 */
export const EPSILON = 1e-9

/**
 * Immutable 2D vector for game math.
 * Every operation returns a new vector; instances are never mutated.
 */
export class Vector2 {
  constructor(
    public readonly x: number = 0,
    public readonly y: number = 0
  ) {}

  /**
   * Create a zero vector
   */
  static zero(): Vector2 {
    return new Vector2(0, 0)
  }

  /**
   * Distance between two points
   */
  static distance(a: Vector2, b: Vector2): number {
    return a.subtract(b).magnitude()
  }

  add(other: Vector2): Vector2 {
    return new Vector2(this.x + other.x, this.y + other.y)
  }

  subtract(other: Vector2): Vector2 {
    return new Vector2(this.x - other.x, this.y - other.y)
  }

  scale(scalar: number): Vector2 {
    return new Vector2(this.x * scalar, this.y * scalar)
  }

  /**
   * Squared length - avoids the sqrt for comparisons
   */
  magnitudeSquared(): number {
    return this.x * this.x + this.y * this.y
  }

  magnitude(): number {
    return Math.sqrt(this.magnitudeSquared())
  }

  /**
   * Unit vector in the same direction, or the zero vector when this
   * vector's magnitude is within EPSILON of zero
   */
  normalized(): Vector2 {
    const len = this.magnitude()
    if (len < EPSILON) return Vector2.zero()
    return new Vector2(this.x / len, this.y / len)
  }

  distanceTo(other: Vector2): number {
    return Vector2.distance(this, other)
  }

  /**
   * Linear interpolation toward another vector (t = 0 keeps this, t = 1 reaches other)
   */
  lerp(other: Vector2, t: number): Vector2 {
    return new Vector2(this.x + (other.x - this.x) * t, this.y + (other.y - this.y) * t)
  }

  /**
   * Component-wise clamp into [min, max] on each axis
   */
  clamp(minX: number, maxX: number, minY: number, maxY: number): Vector2 {
    return new Vector2(
      Math.min(maxX, Math.max(minX, this.x)),
      Math.min(maxY, Math.max(minY, this.y))
    )
  }

  /**
   * Check if this vector equals another (with optional epsilon for floating point comparison)
   */
  equals(other: Vector2, epsilon = 0): boolean {
    if (epsilon === 0) {
      return this.x === other.x && this.y === other.y
    }
    return Math.abs(this.x - other.x) <= epsilon && Math.abs(this.y - other.y) <= epsilon
  }

  isZero(): boolean {
    return this.magnitude() < EPSILON
  }

  /**
   * False when either component is NaN or infinite
   */
  isFinite(): boolean {
    return Number.isFinite(this.x) && Number.isFinite(this.y)
  }

  toString(): string {
    return `Vector2(${this.x}, ${this.y})`
  }
}
