export type EnumNames = ReadonlyMap<number, string>;

/**
 * Names for a bit-flag field. `masked` covers a multi-bit sub-field that holds
 * one enumerated value (the alignment nibble of section characteristics).
 */
export interface FlagNames {
  bits: ReadonlyMap<number, string>;
  masked?: { mask: number; names: EnumNames };
}

export const DOS_MAGIC = 0x5a4d;
export const PE_SIGNATURE = 0x00004550;
export const PE32_MAGIC = 0x10b;
export const PE32_PLUS_MAGIC = 0x20b;

export const MachineType: EnumNames = new Map([
  [0x0, "UNKNOWN"],
  [0x1d3, "AM33"],
  [0x8664, "AMD64"],
  [0x1c0, "ARM"],
  [0xaa64, "ARM64"],
  [0x1c4, "ARMNT"],
  [0xebc, "EBC"],
  [0x14c, "I386"],
  [0x200, "IA64"],
  [0x6232, "LOONGARCH32"],
  [0x6264, "LOONGARCH64"],
  [0x9041, "M32R"],
  [0x266, "MIPS16"],
  [0x366, "MIPSFPU"],
  [0x466, "MIPSFPU16"],
  [0x1f0, "POWERPC"],
  [0x1f1, "POWERPCFP"],
  [0x166, "R4000"],
  [0x5032, "RISCV32"],
  [0x5064, "RISCV64"],
  [0x5128, "RISCV128"],
  [0x1a2, "SH3"],
  [0x1a3, "SH3DSP"],
  [0x1a6, "SH4"],
  [0x1a8, "SH5"],
  [0x1c2, "THUMB"],
  [0x169, "WCEMIPSV2"],
]);

export const Subsystem: EnumNames = new Map([
  [0, "UNKNOWN"],
  [1, "NATIVE"],
  [2, "WINDOWS_GUI"],
  [3, "WINDOWS_CUI"],
  [5, "OS2_CUI"],
  [7, "POSIX_CUI"],
  [8, "NATIVE_WINDOWS"],
  [9, "WINDOWS_CE_GUI"],
  [10, "EFI_APPLICATION"],
  [11, "EFI_BOOT_SERVICE_DRIVER"],
  [12, "EFI_RUNTIME_DRIVER"],
  [13, "EFI_ROM"],
  [14, "XBOX"],
  [16, "WINDOWS_BOOT_APPLICATION"],
]);

export const FileCharacteristics: FlagNames = {
  bits: new Map([
    [0x0001, "RELOCS_STRIPPED"],
    [0x0002, "EXECUTABLE_IMAGE"],
    [0x0004, "LINE_NUMS_STRIPPED"],
    [0x0008, "LOCAL_SYMS_STRIPPED"],
    [0x0010, "AGGRESSIVE_WS_TRIM"],
    [0x0020, "LARGE_ADDRESS_AWARE"],
    [0x0040, "RESERVED"],
    [0x0080, "BYTES_REVERSED_LO"],
    [0x0100, "MACHINE_32BIT"],
    [0x0200, "DEBUG_STRIPPED"],
    [0x0400, "REMOVABLE_RUN_FROM_SWAP"],
    [0x0800, "NET_RUN_FROM_SWAP"],
    [0x1000, "SYSTEM"],
    [0x2000, "DLL"],
    [0x4000, "UP_SYSTEM_ONLY"],
    [0x8000, "BYTES_REVERSED_HI"],
  ]),
};

export const DllCharacteristics: FlagNames = {
  bits: new Map([
    [0x0020, "HIGH_ENTROPY_VA"],
    [0x0040, "DYNAMIC_BASE"],
    [0x0080, "FORCE_INTEGRITY"],
    [0x0100, "NX_COMPAT"],
    [0x0200, "NO_ISOLATION"],
    [0x0400, "NO_SEH"],
    [0x0800, "NO_BIND"],
    [0x1000, "APPCONTAINER"],
    [0x2000, "WDM_DRIVER"],
    [0x4000, "GUARD_CF"],
    [0x8000, "TERMINAL_SERVER_AWARE"],
  ]),
};

export const SectionCharacteristics: FlagNames = {
  bits: new Map([
    [0x00000008, "TYPE_NO_PAD"],
    [0x00000020, "CNT_CODE"],
    [0x00000040, "CNT_INITIALIZED_DATA"],
    [0x00000080, "CNT_UNINITIALIZED_DATA"],
    [0x00000100, "LNK_OTHER"],
    [0x00000200, "LNK_INFO"],
    [0x00000800, "LNK_REMOVE"],
    [0x00001000, "LNK_COMDAT"],
    [0x00008000, "GPREL"],
    [0x00020000, "MEM_16BIT"],
    [0x00040000, "MEM_LOCKED"],
    [0x00080000, "MEM_PRELOAD"],
    [0x01000000, "LNK_NRELOC_OVFL"],
    [0x02000000, "MEM_DISCARDABLE"],
    [0x04000000, "MEM_NOT_CACHED"],
    [0x08000000, "MEM_NOT_PAGED"],
    [0x10000000, "MEM_SHARED"],
    [0x20000000, "MEM_EXECUTE"],
    [0x40000000, "MEM_READ"],
    [0x80000000, "MEM_WRITE"],
  ]),
  // Object files only: 1 << (n - 1) byte alignment
  masked: {
    mask: 0x00f00000,
    names: new Map(
      Array.from({ length: 14 }, (_, i): [number, string] => [(i + 1) << 20, `ALIGN_${1 << i}BYTES`])
    ),
  },
};

export const ResourceType: EnumNames = new Map([
  [1, "CURSOR"],
  [2, "BITMAP"],
  [3, "ICON"],
  [4, "MENU"],
  [5, "DIALOG"],
  [6, "STRING"],
  [7, "FONTDIR"],
  [8, "FONT"],
  [9, "ACCELERATOR"],
  [10, "RCDATA"],
  [11, "MESSAGETABLE"],
  [12, "GROUP_CURSOR"],
  [14, "GROUP_ICON"],
  [16, "VERSION"],
  [17, "DLGINCLUDE"],
  [19, "PLUGPLAY"],
  [20, "VXD"],
  [21, "ANICURSOR"],
  [22, "ANIICON"],
  [23, "HTML"],
  [24, "MANIFEST"],
]);

export const DataDirectoryNames = [
  "Export Table",
  "Import Table",
  "Resource Table",
  "Exception Table",
  "Certificate Table",
  "Base Relocation Table",
  "Debug",
  "Architecture",
  "Global Ptr",
  "TLS Table",
  "Load Config Table",
  "Bound Import",
  "IAT",
  "Delay Import Descriptor",
  "CLR Runtime Header",
  "Reserved",
] as const;

export const RESOURCE_DIRECTORY_INDEX = 2;
export const CERTIFICATE_DIRECTORY_INDEX = 4;

export function enumName(value: number, names: EnumNames): string {
  return names.get(value) ?? `UNKNOWN(0x${value.toString(16)})`;
}

/** Flag names in ascending bit order; bits with no name are kept as one hex value at the end. */
export function flagNames(value: number, flags: FlagNames): string[] {
  const result: string[] = [];
  let rest = value >>> 0;
  let fieldName: string | undefined;

  if (flags.masked) {
    const field = (rest & flags.masked.mask) >>> 0;
    fieldName = flags.masked.names.get(field);
    if (fieldName !== undefined) rest = (rest & ~flags.masked.mask) >>> 0;
  }

  const bits = [...flags.bits].sort(([a], [b]) => a - b);
  for (const [bit, name] of bits) {
    if ((rest & bit) >>> 0 === bit) {
      result.push(name);
      rest = (rest & ~bit) >>> 0;
    }
  }
  if (fieldName !== undefined) result.push(fieldName);
  if (rest !== 0) result.push(`0x${rest.toString(16)}`);
  return result;
}
