import { ConstructorRegistry } from '../core/constructor-registry.js';
import { defineOperation } from '../core/operations.js';
import type { MenuTarget, Operation } from '../core/operations.js';
import type { Runnable } from '../core/main-menu.js';
import type { MenuConsole } from '../core/menu-console.js';
import { SubMenu } from '../core/sub-menu.js';
import { param, t } from '../core/value-types.js';
import type { OutputSink } from '../ui/screen.js';

export class Contact {
  constructor(
    readonly name: string,
    readonly phone = '',
    readonly age = 0,
  ) {}

  toString(): string {
    return this.phone ? `${this.name} <${this.phone}> (${this.age})` : this.name;
  }
}

export const contactType = t.instance(Contact);

const contactName = param('name', t.string());
const contactPhone = param('phone', t.word());
const contactAge = param('age', t.int8());

/** Contact constructors: name only, or name, phone and age. */
export function createContactRegistry(): ConstructorRegistry {
  return new ConstructorRegistry()
    .register(contactType, {
      parameters: [contactName],
      create: (args) => new Contact(args.get(contactName)),
    })
    .register(contactType, {
      parameters: [contactName, contactPhone, contactAge],
      create: (args) => {
        const age = args.get(contactAge);
        if (age < 0) throw new RangeError(`Age cannot be negative: ${age}`);
        return new Contact(args.get(contactName), args.get(contactPhone), age);
      },
    });
}

const contact = param('contact', contactType);
const contacts = param('contacts', t.array(contactType));
const name = param('name', t.string());

export const LIST_CONTACTS = 'List contacts';

export class AddressBook implements MenuTarget {
  private readonly contacts: Contact[] = [];

  constructor(private readonly out: OutputSink) {}

  get size(): number {
    return this.contacts.length;
  }

  add(entry: Contact): void {
    this.contacts.push(entry);
    this.out.write(`Added ${entry.toString()}\n`);
  }

  addAll(entries: readonly Contact[]): void {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  remove(contactName: string): boolean {
    const index = this.contacts.findIndex((c) => c.name === contactName);
    if (index === -1) {
      this.out.write(`No contact named ${contactName}\n`);
      return false;
    }
    this.contacts.splice(index, 1);
    this.out.write(`Removed ${contactName}\n`);
    return true;
  }

  getContacts(): readonly Contact[] {
    return this.contacts;
  }

  list(): void {
    this.contacts.forEach((c, i) => {
      this.out.write(`${i + 1}. ${c.toString()}\n`);
    });
  }

  describeOperations(): readonly Operation[] {
    return [
      defineOperation('addContact', [contact], (args) => this.add(args.get(contact))),
      defineOperation('addContacts', [contacts], (args) => this.addAll(args.get(contacts))),
      defineOperation('removeContact', [name], (args) => this.remove(args.get(name))),
      defineOperation('getContacts', [], () => this.getContacts()),
      defineOperation('toString', [], () => `AddressBook(${this.contacts.length})`),
    ];
  }
}

export class AddressBookMenu implements Runnable {
  constructor(
    private readonly book: AddressBook,
    private readonly registry: ConstructorRegistry = createContactRegistry(),
  ) {}

  async run(io: MenuConsole): Promise<void> {
    const menu = new SubMenu(this.book, {
      name: 'Address book',
      console: io,
      registry: this.registry,
      customOptions: [LIST_CONTACTS],
    });

    while (true) {
      const selection = await menu.run(io);
      if (selection === menu.exitIndex) return;

      const resolved = menu.options.resolve(selection);
      if (resolved.kind === 'custom' && resolved.marker === LIST_CONTACTS) {
        this.book.list();
      }
    }
  }
}
