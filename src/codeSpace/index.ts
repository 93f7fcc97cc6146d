export {
  CodeSpaceError,
  encodeCode,
  decodeCode,
  createCodeSpace,
  generateCodes,
  countCodes,
  buildCodeSpaceFromConfig,
} from "./codeSpace";
