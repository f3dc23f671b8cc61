export { dropDegenerateTriangles, readMesh, writeMesh } from './skn-codec';
