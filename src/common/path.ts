export const splitPath = (input: string): string[] =>
  input.replace(/\\/g, '/').split('/').filter((part) => part.length > 0);

export const lastPathComponent = (input: string): string => {
  const segments = splitPath(input);
  const last = segments[segments.length - 1];
  if (last === undefined) {
    return input.startsWith('/') ? '/' : input;
  }
  return last;
};

export const splitStemAndExtension = (name: string) => {
  const lastDot = name.lastIndexOf('.');
  if (lastDot <= 0) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, lastDot), extension: name.slice(lastDot) };
};

/** Lower-cased extension of the last path component, without the dot. */
export const extensionOf = (input: string) =>
  splitStemAndExtension(lastPathComponent(input)).extension.slice(1).toLowerCase();

export const isHiddenName = (name: string) => name.startsWith('.');

export const isApplicationBundle = (input: string) => extensionOf(input) === 'app';
