export class User {
	id = 0;
	name = '';
}

export class Admin extends User {
	level = 1;
}

export class Broken {
	id = 0;
}
