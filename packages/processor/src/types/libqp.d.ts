// libqp ships no type declarations.
declare module "libqp" {
  const libqp: {
    /** Decode a quoted-printable string into raw bytes. */
    decode(input: string): Buffer;
  };
  export default libqp;
}
