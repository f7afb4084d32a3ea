export type RowKey = {
  number: string;
  section: string;
  callNumber: string;
  title: string;
};

export function acceptRow({ number, section, callNumber, title }: RowKey): boolean {
  if (!title.trim()) return false;
  return Boolean(number.trim()) || Boolean(section.trim()) || /^\d+$/.test(callNumber.trim());
}
