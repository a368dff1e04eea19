import { writeFileSync } from "node:fs";
import { basename } from "node:path";
import {
    ByteCursor,
    DirectorySink,
    FileSource,
    HTMLOutput,
    JsonOutput,
    NotEnoughBytesError,
    PEFile,
    PEFormatError,
    ResourceManager,
    TextOutput,
    extractResources,
} from "../src/index.ts";

const USAGE = `Usage: pe-info FILE [options]

  -d, --dump                     Dump file info
  -J, --json                     JSON output (with --dump)
      --html                     HTML output (with --dump)
      --unpack-dos-code          Extract DOS code to --output
  -F, --unpack-data-directory N  Extract data directory N to --output
  -S, --unpack-section NAME      Extract section NAME to --output
  -R, --unpack-resources [NAME]  Extract resources (from section NAME) into directory --output
  -O, --output PATH              Output file or directory`;

interface Options {
    file: string;
    dump: boolean;
    json: boolean;
    html: boolean;
    unpackDosCode: boolean;
    dataDirectory: number | null;
    section: string | null;
    resources: boolean;
    resourceSection: string | null;
    output: string | null;
}

class UsageError extends Error {}

function parseArgs(argv: string[]): Options {
    const options: Options = {
        file: "",
        dump: false,
        json: false,
        html: false,
        unpackDosCode: false,
        dataDirectory: null,
        section: null,
        resources: false,
        resourceSection: null,
        output: null,
    };

    const value = (i: number, flag: string) => {
        const next = argv[i + 1];
        if (next === undefined) throw new UsageError(`${flag} needs a value`);
        return next;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? "";
        switch (arg) {
            case "-d": case "--dump": options.dump = true; break;
            case "-J": case "--json": options.json = true; break;
            case "--html": options.html = true; break;
            case "--unpack-dos-code": options.unpackDosCode = true; break;
            case "-F": case "--unpack-data-directory": {
                const index = Number.parseInt(value(i++, arg), 10);
                if (Number.isNaN(index) || index < 0) throw new UsageError(`${arg} needs a directory number`);
                options.dataDirectory = index;
                break;
            }
            case "-S": case "--unpack-section": options.section = value(i++, arg); break;
            case "-R": case "--unpack-resources": {
                options.resources = true;
                const next = argv[i + 1];
                if (next !== undefined && !next.startsWith("-") && options.file !== "") {
                    options.resourceSection = next;
                    i++;
                }
                break;
            }
            case "-O": case "--output": options.output = value(i++, arg); break;
            default:
                if (arg.startsWith("-") || options.file !== "") throw new UsageError(`Unexpected argument ${arg}`);
                options.file = arg;
        }
    }

    if (options.file === "") throw new UsageError("No file given");
    return options;
}

function requireOutput(options: Options, what: string): string {
    if (options.output === null) throw new UsageError(`${what} needs --output`);
    return options.output;
}

function run(options: Options) {
    const source = new FileSource(options.file);
    try {
        const cursor = new ByteCursor(source);
        const pe = PEFile.read(cursor);

        if (options.unpackDosCode) {
            writeFileSync(requireOutput(options, "--unpack-dos-code"), pe.dosCode);
        }

        if (options.dataDirectory !== null) {
            const directory = pe.dataDirectories[options.dataDirectory];
            if (!directory) throw new UsageError(`No data directory ${options.dataDirectory}`);
            const offset = pe.dataDirectoryOffset(options.dataDirectory);
            if (offset < 0) throw new UsageError(`Data directory ${options.dataDirectory} is empty or outside every section`);
            cursor.position = offset;
            writeFileSync(requireOutput(options, "--unpack-data-directory"), cursor.readBytes(directory.size));
        }

        if (options.section !== null) {
            const section = pe.sections.get(options.section);
            if (!section) throw new UsageError(`No section named ${options.section}`);
            cursor.position = section.pointerToRawData;
            writeFileSync(requireOutput(options, "--unpack-section"), cursor.readBytes(section.sizeOfRawData));
        }

        if (options.resources) {
            const outDir = requireOutput(options, "--unpack-resources");
            let manager: ResourceManager | null;
            if (options.resourceSection !== null) {
                const section = pe.sections.get(options.resourceSection);
                if (!section) throw new UsageError(`No section named ${options.resourceSection}`);
                manager = new ResourceManager(cursor, section);
            } else {
                manager = pe.resources(cursor);
            }
            if (!manager) throw new UsageError("Image has no resource section");
            const count = extractResources(cursor, manager.resources, new DirectorySink(outDir));
            console.log(`Extracted ${count} resources to ${outDir}`);
        }

        if (options.dump) {
            if (options.json) {
                const out = new JsonOutput();
                pe.printInfo(out);
                console.log(JSON.stringify(out.result, null, 2));
            } else if (options.html) {
                const out = new HTMLOutput(basename(options.file));
                pe.printInfo(out);
                if (options.output !== null && !options.resources) {
                    writeFileSync(options.output, out.render());
                } else {
                    console.log(out.render());
                }
            } else {
                pe.printInfo(new TextOutput(line => console.log(line)));
            }
        }
    } finally {
        source.close();
    }
}

function main(): number {
    let options: Options | null = null;
    try {
        options = parseArgs(process.argv.slice(2));
        run(options);
        return 0;
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`${err.message}\n\n${USAGE}`);
            return 2;
        }
        if (err instanceof PEFormatError || err instanceof NotEnoughBytesError) {
            console.error(`${options?.file ?? ""}: ${err.message}`);
            return 1;
        }
        throw err;
    }
}

process.exitCode = main();
