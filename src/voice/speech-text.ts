export const MAX_SPEECH_CHUNK_LENGTH = 200;

/** Strips markdown so the synthesizer does not read formatting aloud. */
export function cleanTextForSpeech(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, "")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/\*(.*?)\*/g, "$1")
    .replace(/^#{1,6}\s*/gm, "")
    .replace(/`(.*?)`/g, "$1")
    .replace(/^---+$/gm, "")
    .replace(/\n+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Splits on sentence punctuation. Sentences longer than the limit are
 * broken again at commas.
 */
export function splitIntoSpeechChunks(text: string, maxLength = MAX_SPEECH_CHUNK_LENGTH): string[] {
  const sentences = cleanTextForSpeech(text).split(/(?<=[.!?:;])\s+/);
  const chunks: string[] = [];
  for (const sentence of sentences) {
    if (sentence.length <= maxLength) {
      chunks.push(sentence);
      continue;
    }
    let current = "";
    for (const part of sentence.split(",")) {
      if (current.length + part.length < maxLength) {
        current += `${part},`;
        continue;
      }
      if (current) {
        chunks.push(current.replace(/,$/, ""));
      }
      current = `${part},`;
    }
    if (current) {
      chunks.push(current.replace(/,$/, ""));
    }
  }
  return chunks.map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
}
