/**
 * 로그용 연락처 마스킹.
 * 이메일은 로컬 파트 첫 글자만, 전화번호는 앞 4자리와 끝 2자리만 남긴다.
 */
export function maskDestination(destination: string): string {
  const at = destination.indexOf('@');
  if (at > 0) {
    return `${destination[0]}***${destination.slice(at)}`;
  }
  if (destination.length <= 6) return '****';
  return `${destination.slice(0, 4)}****${destination.slice(-2)}`;
}

/** 길이 제한 초과 시 말줄임 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 1))}…`;
}
