/** How-to-fill text written under the header of generated files. */
export const DEFAULT_DESCRIPTION = `How to fill in this file

Options are grouped under [section] headers and written as "option = value".
Lines starting with # or ; are comments and are ignored when the file is read.
Each option lists the types it accepts above it; a value of any other type is rejected.

1. Text:
   - Characters between double quotes. Escape quotes and backslashes with a backslash.
   - Example: "hello", "C:\\\\data", "say \\"hi\\"".

2. Integer:
   - Whole number without a decimal point.
   - Example: 42, -7.

3. Decimal:
   - Number with a decimal point and at least one digit after it.
   - Example: 3.14, -0.5, 2.0.

4. Boolean:
   - true or false, in lowercase only. True and FALSE are not valid.

5. List:
   - Values between square brackets, separated by commas. May span several lines.
   - Example: [1, 2, 3], ["apple", "banana"].

6. Dictionary:
   - Key and value pairs between braces. Keys are quoted text, followed by a colon.
   - Example: {"host": "localhost", "port": 5432}.

7. Null:
   - No value. Leave nothing after the = sign or write null.
   - Example: option = or option = null.`
