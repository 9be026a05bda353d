export { NodeFileSystem, nodeFileSystem } from "./nodeFileSystem";
