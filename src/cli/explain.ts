export const explanation = `
How shotname works:

1. Each file is looked at once, in the order given on the command line.
2. Directories and missing paths are reported and left alone.
3. A timestamp is taken from the first date source that yields one
   (exif, file-name, file-created, file-modified; default: exif).
4. The timestamp is formatted with the date format and the lower-cased
   extension is appended.
5. A file already named that way, or that way plus a "-N" counter, is left alone.
6. Otherwise the first free name of NAME.ext, NAME-1.ext, NAME-2.ext, ... is used.
7. With --simulate nothing is changed; the same decisions are only printed.

Options may also be set in a JSON config file (see --config).
`;
