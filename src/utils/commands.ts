/**
 * 目標ごとのコマンド入力（";" または改行区切り）
 */
export function parseCommandList(input: string): string[] {
  return input
    .split(/[;\n]/)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}
