/**
 * Pile CLI Help Content
 * Dense, progressive-discovery language reference for terminal output.
 */

export const QUICKREF = `
PILE QUICK REFERENCE (v0.1)
===========================

PROGRAM SHAPE
  A program is a sequence of words run left to right on one shared stack.
  1 2 +                 # push 1, push 2, add -> 3
  "hi" println          # print a line
  # comment to end of line

OPERAND ORDER
  The top value is the LEFT operand:  2 10 /  -> 5    1 5 -  -> 4

VALUES
  number: 42 -3 2.5 'a'(=97)   string: "a\\tb"   bool: true false   nil
  array: array 1 2 3 end

BLOCKS (all closed by 'end')
  cond if ... else ... end      loop ... break ... continue ... end
  proc name ... end             def name ... end (constant)
  a b as x y let ... end        value let name
  import "lib.pile"             # top level only

EXIT CODES: 0=ok  2=lex/parse/validate  3=bind  4=runtime/io  N=exit status

HELP TOPICS
  pile help syntax
  pile help stack
  pile help flow
  pile help names
  pile help builtins
  pile help imports
  pile help errors
  pile help stdlib
  pile help stdlib --index
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
PILE SYNTAX REFERENCE
=====================

COMMENTS
  # runs to the end of the line

LITERALS
  42  -3  2.5  .5  7.           numbers (a leading '-' touching a digit)
  'a'  '\\n'                     character literal -> its code point
  "text\\n"                      string; escapes: \\n \\r \\t \\0 \\" \\' \\\\
  true  false  nil

WORDS
  Identifiers: letter or underscore, then letters, digits, underscores.
  A keyword followed by identifier characters is an identifier: 'iffy'.

KEYWORDS
  if else end loop break continue return proc def let as array import
  true false nil

OPERATORS
  + - * / % **   = != < > <= >=   << >> | & ~   @ ! ?

MALFORMED INPUT (E_LEX)
  1.2.3  12abc  'ab'  "unterminated  "bad \\q escape"  $
`.trimStart(),

// ─── STACK ──────────────────────────────────────────────────────────────────
stack: `
PILE STACK REFERENCE
====================

One stack is shared by the whole program, its procedures and its imports.

SHUFFLING                      before -> after (top on the right)
  dup     a       -> a a
  drop    a       ->
  swap    a b     -> b a
  over    a b     -> a b a
  rot     a b c   -> b c a        45 5 12 rot -> 5 12 45

BINARY OPERATORS
  The top value is the left operand:
  2 10 /   -> 5       2 10 %  -> 0      2 10 **  -> 100
  1 5 -    -> 4       1 5 >   -> true   1 4 <<   -> 8

ARITHMETIC    + - * / % **  numbers only; / and % by zero fail
COMPARISON    = != any values (arrays compare element-wise)
              < > <= >= two numbers or two strings
BITWISE       << >> integers; | & ~ integers or bools
INDEXING      seq i @        element (arrays) or one-character string
              arr i v !      store v at index i (arrays, in place)
NIL TEST      v ?            true when v is nil

UNDERFLOW
  Popping more values than the stack holds fails with E_STACK_UNDERFLOW.
  Inside 'array ... end' the stack below the array's start is out of reach.
`.trimStart(),

// ─── FLOW ───────────────────────────────────────────────────────────────────
flow: `
PILE CONTROL FLOW
=================

IF
  cond if ... end
  cond if ... else ... end
  The condition is popped and must be a bool (E_TYPE_MISMATCH otherwise).
  0 1 > if "yes" println else "no" println end

LOOP
  loop ... end repeats forever;
  break leaves the innermost loop, continue restarts it.
  0 let i
  loop
    i 5 = if break end
    i println
    i 1 + let i
  end

PROCEDURES
  proc name ... end       declared at top level, callable before or after
  return                  leaves the current procedure
  Recursion is allowed up to the call depth limit (default 1000,
  pile.json "maxCallDepth" or run --max-depth).

EXIT
  status exit             stops the program with an integer status

STATIC CHECKS (exit 2)
  E_BREAK_OUTSIDE_LOOP  E_CONTINUE_OUTSIDE_LOOP  E_RETURN_OUTSIDE_PROC
  E_NESTED_DECL         E_EMPTY_DEF              E_DUP_BINDING
`.trimStart(),

// ─── NAMES ──────────────────────────────────────────────────────────────────
names: `
PILE NAMES AND BINDINGS
=======================

DEF (constant)
  def answer 6 7 * end
  The body runs once, where the def appears, and must leave exactly one
  value (E_INVALID_DEFINITION). Uses push the cached value.

LET (variable)
  42 let n          pop into n; later 'n' pushes the value
  n 1 + let n       reassignment is allowed
  Inside an 'as' block, let assigns in that block's scope.

AS..LET (local scope)
  1 2 as a b let a b end     -> 1 2
  Pops one value per name, deepest value first, binds them for the body.
  The names are gone after 'end' (E_UNDEFINED_NAME).
  Procedures called from the body can see the names.

LOOKUP ORDER
  local names, then let variables, then procedures and definitions,
  then builtins.

ONE NAMESPACE
  proc, def and let names are shared by the program and all imports.
  Reusing one, or a builtin name, is E_DUPLICATE_DEFINITION (exit 3).
`.trimStart(),

// ─── BUILTINS ───────────────────────────────────────────────────────────────
builtins: `
PILE BUILTIN WORDS
==================

STACK      dup drop swap over rot
OUTPUT     print println             stdout (strings raw, others as literals)
           eprint eprintln           stderr
           trace                     debug form of the top value, not popped
INPUT      input                     next stdin line, or nil at end of input
FILES      path readfile             text, or nil when unreadable
           text path writefile       true on success, false otherwise
CONTROL    status exit
TYPES      typeof                    "number" "string" "bool" "nil" "array"
           len                       array length or string code points
CONVERT    tostring                  display form
           toint tofloat             numbers, numeric strings, bools; else nil
           tobool                    nil false 0 "" [] -> false
           chr ord                   code point <-> one-character string

DISPLAY FORMS
  println: 1  2.5  true  nil  hello  [1, "a", nil]
  trace:   1  2.5  true  nil  "hello"  [1, "a", nil]
`.trimStart(),

// ─── IMPORTS ────────────────────────────────────────────────────────────────
imports: `
PILE IMPORTS
============

  import "lib/util.pile"
  import "math"                # '.pile' is added when there is no extension

RESOLUTION ORDER
  1. the importing file's directory
  2. each -I/--import directory given to 'pile run' or 'pile check'
  3. importPaths from pile.json or ~/.pile/config.json
  4. the standard library

SEMANTICS
  Imports sit at the top level. Every file is loaded and run once, in
  import order, even when several files import it. Procedures and
  definitions from all files share one namespace.

ERRORS (exit 3)
  E_IMPORT_NOT_FOUND    no candidate file exists
  E_CYCLIC_IMPORT       a.pile -> b.pile -> a.pile
  E_DUPLICATE_DEFINITION  the same name in two files
`.trimStart(),

// ─── ERRORS ─────────────────────────────────────────────────────────────────
errors: `
PILE DIAGNOSTICS
================

Diagnostics print to stderr as JSON ({ code, message, span, hint, details })
or, with --pretty:
  error[E_PARSE]: expected 'end' to close 'if' but found end of file
    --> main.pile:3:5
    hint: Every if, loop, proc, def, as and array block needs a matching 'end'.

LEX / PARSE / VALIDATE (exit 2)
  E_LEX  E_PARSE  E_AST  E_BREAK_OUTSIDE_LOOP  E_CONTINUE_OUTSIDE_LOOP
  E_RETURN_OUTSIDE_PROC  E_NESTED_DECL  E_DUP_BINDING  E_EMPTY_DEF

BIND (exit 3)
  E_DUPLICATE_DEFINITION  E_CYCLIC_IMPORT  E_UNDEFINED_NAME
  E_IMPORT_NOT_FOUND

RUNTIME (exit 4)
  E_STACK_UNDERFLOW  E_TYPE_MISMATCH  E_DIVISION_BY_ZERO
  E_RECURSION_LIMIT  E_INDEX_OUT_OF_BOUNDS  E_INVALID_DEFINITION
  E_RUNTIME (unexpected failure)

CLI
  E_IO      a source, trace or output file could not be read or written
  E_USAGE   an invalid option value (exit 1)
`.trimStart(),

// ─── STDLIB ─────────────────────────────────────────────────────────────────
stdlib: `
PILE STANDARD LIBRARY
=====================

The standard library is ordinary Pile source, found after every other
import directory.

  import "math"    abs min max square factorial gcd clamp
  import "seq"     sum product contains index_of reverse_in_place
  import "str"     is_empty count_char starts_with

EXAMPLES
  import "math"
  12 18 gcd println          # 6
  15 0 10 clamp println      # 10

  import "seq"
  array 1 2 3 end sum println

Run 'pile help stdlib --index' for every procedure with its stack effect.
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);
