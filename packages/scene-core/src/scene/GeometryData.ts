import * as THREE from 'three';

let geometryCounter = 0;

/**
 * Geometry payload shared by reference between scene objects.
 *
 * Identity matters: two objects share data only when they hold the same
 * GeometryData instance. `users` is maintained by `SceneObject.geometry`.
 */
export class GeometryData {
  readonly id: number;
  name: string;
  buffer: THREE.BufferGeometry;
  private userCount = 0;

  constructor(name: string, buffer: THREE.BufferGeometry = new THREE.BufferGeometry()) {
    this.id = ++geometryCounter;
    this.name = name;
    this.buffer = buffer;
  }

  /**
   * Build geometry from a flat xyz position list
   */
  static fromPositions(name: string, positions: number[]): GeometryData {
    const buffer = new THREE.BufferGeometry();
    buffer.setAttribute('position', new THREE.Float32BufferAttribute(positions, 3));
    return new GeometryData(name, buffer);
  }

  get users(): number {
    return this.userCount;
  }

  /** @internal */
  addUser(): void {
    this.userCount++;
  }

  /** @internal */
  removeUser(): void {
    this.userCount = Math.max(0, this.userCount - 1);
  }

  /**
   * Independent copy with no users
   */
  copy(): GeometryData {
    return new GeometryData(`${this.name}.001`, this.buffer.clone());
  }

  /**
   * Bake a matrix into the vertex data
   */
  applyMatrix(matrix: THREE.Matrix4): void {
    this.buffer.applyMatrix4(matrix);
  }

  /**
   * Vertex positions as vectors in object space
   */
  getVertices(): THREE.Vector3[] {
    const position = this.buffer.getAttribute('position');
    if (!position) return [];

    const vertices: THREE.Vector3[] = [];
    for (let i = 0; i < position.count; i++) {
      vertices.push(new THREE.Vector3().fromBufferAttribute(position, i));
    }
    return vertices;
  }
}
