export { BufferByteSink, BufferByteSource } from './buffer'
export {
  FileDescriptorByteSink,
  FileDescriptorByteSource,
  retryWhileBusy,
} from './file-descriptor'
export { readLine, writeText } from './text'
