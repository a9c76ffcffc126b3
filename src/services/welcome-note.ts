import { Note } from '../core/note.js';

const WELCOME_CONTENT = `<h1>Welcome to Quillbox</h1>
<p>A quiet place for your notes.</p>
<h2>How it works</h2>
<ul>
  <li><b>Rich text</b>: notes are stored as HTML, the first line becomes the title</li>
  <li><b>Auto-save</b>: edits are written to disk a moment after you stop typing</li>
  <li><b>Search</b>: filter notes by any word in their title or text</li>
  <li><b>Favourites</b>: star the notes you come back to</li>
</ul>
<p>Create a new note to get started.</p>`;

/**
 * First note shown on an empty notes directory.
 */
export function createWelcomeNote(): Note {
  const note = Note.create();
  note.updateContent(WELCOME_CONTENT);
  return note;
}
