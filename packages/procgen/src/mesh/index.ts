export { Mesh, validateMesh, type Color3, type MeshBuffers } from "./Mesh.js";
