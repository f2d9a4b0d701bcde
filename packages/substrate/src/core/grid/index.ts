export { Buffer, type BufferInfo } from "./buffer";
