export { assertChunkSize, splitIntoChunks, writeChunked } from './chunked-writer';
export {
  createBufferedOutput,
  createStreamOutput,
  type BufferedOutput
} from './page-output';
