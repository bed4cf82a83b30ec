export type Isbn = string;

export interface Book {
  isbn: Isbn;
  title: string;
  author: string;
  price: number;
}

// JSON shape on the wire (field names are capitalised)
export interface BookWire {
  ISBN: Isbn;
  Title: string;
  Author: string;
  Price: number;
}

export function toWire(book: Book): BookWire {
  return {
    ISBN: book.isbn,
    Title: book.title,
    Author: book.author,
    Price: book.price,
  };
}

export function fromWire(wire: BookWire): Book {
  return {
    isbn: wire.ISBN,
    title: wire.Title,
    author: wire.Author,
    price: wire.Price,
  };
}
