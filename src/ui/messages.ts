export type Locale = 'es' | 'en';

export interface Messages {
  selectOption: string;
  exitLabel: string;
  closing: string;
  invalidOption: string;
  invalidValue: string;
  somethingWentWrong: string;
  /** Lower-case character that counts as "yes" in confirmations. */
  affirmative: string;
  confirm: string;
  confirmValue(value: string): string;
  argumentNumber(position: number): string;
  autoFillHeading: string;
  keepEntering: string;
  stepBack: string;
  cancelKeyword: string;
  cancelPrompt: string;
  undoing: string;
  steppingBack: string;
  invalidChoiceRetry: string;
  valuePrompt(name: string, typeName: string): string;
  arraySizePrompt(name: string, elementTypeName: string): string;
  creatingInstance(typeName: string): string;
}

const es: Messages = {
  selectOption: 'Selecciona una opción.\n',
  exitLabel: 'Salir',
  closing: 'Cerrando el programa.',
  invalidOption: 'Opción inválida.',
  invalidValue: 'Valor inválido. Por favor, intente de nuevo...',
  somethingWentWrong: 'Algo salió mal...',
  affirmative: 's',
  confirm: '¿Estás seguro? (S/N)...',
  confirmValue: (value) => `¿Estás seguro? Valor introducido: ${value} (S/N)...`,
  argumentNumber: (position) => `ARGUMENTO NÚMERO: ${position}`,
  autoFillHeading: 'Introducción automatica de parametros.',
  keepEntering: '1- Seguir introduciendo.',
  stepBack: '2- Retroceder.',
  cancelKeyword: 'DESHACER',
  cancelPrompt: 'Estas seguro?. Si no es así escribe DESHACER\n',
  undoing: 'Retrocediendo.',
  steppingBack: 'Retrocediendo...',
  invalidChoiceRetry: 'Opción invalida. Vuelve a ingresarla.',
  valuePrompt: (name, typeName) => `Introduzca un valor para: ${name} (${typeName}): \n`,
  arraySizePrompt: (name, elementTypeName) =>
    `Introduzca el tamaño del array para: ${name} (${elementTypeName}): `,
  creatingInstance: (typeName) => `Creando instancia del tipo personalizado: ${typeName}`,
};

const en: Messages = {
  selectOption: 'Select an option.\n',
  exitLabel: 'Exit',
  closing: 'Closing the program.',
  invalidOption: 'Invalid option.',
  invalidValue: 'Invalid value. Please try again...',
  somethingWentWrong: 'Something went wrong...',
  affirmative: 'y',
  confirm: 'Are you sure? (Y/N)...',
  confirmValue: (value) => `Are you sure? Value entered: ${value} (Y/N)...`,
  argumentNumber: (position) => `ARGUMENT NUMBER: ${position}`,
  autoFillHeading: 'Automatic parameter entry.',
  keepEntering: '1- Keep entering.',
  stepBack: '2- Step back.',
  cancelKeyword: 'UNDO',
  cancelPrompt: 'Are you sure? If not, type UNDO\n',
  undoing: 'Stepping back.',
  steppingBack: 'Stepping back...',
  invalidChoiceRetry: 'Invalid option. Enter it again.',
  valuePrompt: (name, typeName) => `Enter a value for: ${name} (${typeName}): \n`,
  arraySizePrompt: (name, elementTypeName) =>
    `Enter the array size for: ${name} (${elementTypeName}): `,
  creatingInstance: (typeName) => `Creating instance of custom type: ${typeName}`,
};

const CATALOGS: Record<Locale, Messages> = { es, en };

export function getMessages(locale: Locale): Messages {
  return CATALOGS[locale];
}
