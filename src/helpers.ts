import type { SectionHeader } from "./SectionHeader.ts";

/** The section whose mapped range holds `rva`. */
export function sectionForRva(rva: number, sections: Iterable<SectionHeader>): SectionHeader | null {
  for (const section of sections) {
    if (section.containsRva(rva)) return section;
  }
  return null;
}

/** File offset of an RVA, or -1 when no section maps it. */
export function rvaToOffset(rva: number, sections: Iterable<SectionHeader>): number {
  const section = sectionForRva(rva, sections);
  if (!section) return -1;
  return section.pointerToRawData + (rva - section.virtualAddress);
}
